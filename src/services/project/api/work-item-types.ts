import type { RemoteClient } from '../client.js';
import { WorkItemTypesSchema } from '../types.js';
import { callApi } from './request.js';

export interface WorkItemTypeSummary {
  name: string;
  key: string;
}

export class WorkItemTypeApi {
  constructor(private readonly client: RemoteClient) {}

  async list(workspaceKey: string): Promise<WorkItemTypeSummary[]> {
    const types = await callApi(
      this.client,
      'GET',
      `/open_api/${encodeURIComponent(workspaceKey)}/work_item/all-types`,
      undefined,
      WorkItemTypesSchema.nullish(),
    );
    const out: WorkItemTypeSummary[] = [];
    for (const t of types ?? []) {
      if (t.name && t.type_key) {
        out.push({ name: t.name, key: t.type_key });
      }
    }
    return out;
  }
}
