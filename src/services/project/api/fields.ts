import type { RemoteClient } from '../client.js';
import { FieldDefinitionsSchema, type RawFieldDefinition } from '../types.js';
import { callApi } from './request.js';

export class FieldApi {
  constructor(private readonly client: RemoteClient) {}

  /** Every field of an item type, option trees included. */
  async listAll(workspaceKey: string, typeKey: string): Promise<RawFieldDefinition[]> {
    const fields = await callApi(
      this.client,
      'POST',
      `/open_api/${encodeURIComponent(workspaceKey)}/field/all`,
      { work_item_type_key: typeKey },
      FieldDefinitionsSchema.nullish(),
    );
    return fields ?? [];
  }
}
