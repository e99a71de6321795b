import type { RemoteClient } from '../client.js';
import { type RawUser, UsersSchema } from '../types.js';
import { callApi } from './request.js';

export class UserApi {
  constructor(private readonly client: RemoteClient) {}

  /** Tenant-wide user search by name or email. */
  async search(query: string, workspaceKey?: string): Promise<RawUser[]> {
    const body: Record<string, unknown> = { query };
    if (workspaceKey) {
      body.project_key = workspaceKey;
    }
    const users = await callApi(
      this.client,
      'POST',
      '/open_api/user/search',
      body,
      UsersSchema.nullish(),
    );
    return users ?? [];
  }

  async query(userKeys: string[]): Promise<RawUser[]> {
    if (userKeys.length === 0) {
      return [];
    }
    const users = await callApi(
      this.client,
      'POST',
      '/open_api/user/query',
      { user_keys: userKeys },
      UsersSchema.nullish(),
    );
    return users ?? [];
  }
}
