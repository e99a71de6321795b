import type { RemoteClient } from '../client.js';
import { WorkspaceDetailsSchema, WorkspaceKeysSchema } from '../types.js';
import { callApi } from './request.js';

export interface WorkspaceSummary {
  key: string;
  name: string;
}

export interface WorkspaceApiOptions {
  /** Default user_key for listing calls */
  userKey?: string;
  tenantGroupId?: number;
}

export class WorkspaceApi {
  constructor(
    private readonly client: RemoteClient,
    private readonly options: WorkspaceApiOptions = {},
  ) {}

  /** Keys of every workspace visible to the user. */
  async listKeys(userKey?: string): Promise<string[]> {
    const keys = await callApi(
      this.client,
      'POST',
      '/open_api/projects',
      {
        user_key: userKey ?? this.options.userKey,
        tenant_group_id: this.options.tenantGroupId ?? 0,
      },
      WorkspaceKeysSchema.nullish(),
    );
    return keys ?? [];
  }

  /**
   * Names for the given keys. The service answers with a key-indexed object;
   * a list of `{project_key, name}` is accepted as well.
   */
  async getDetails(keys: string[], userKey?: string): Promise<WorkspaceSummary[]> {
    if (keys.length === 0) {
      return [];
    }
    const details = await callApi(
      this.client,
      'POST',
      '/open_api/projects/detail',
      {
        project_keys: keys,
        user_key: userKey ?? this.options.userKey,
        tenant_group_id: this.options.tenantGroupId ?? 0,
      },
      WorkspaceDetailsSchema.nullish(),
    );
    if (!details) {
      return [];
    }
    const out: WorkspaceSummary[] = [];
    if (Array.isArray(details)) {
      for (const entry of details) {
        if (entry.name) {
          out.push({ key: entry.project_key, name: entry.name.trim() });
        }
      }
      return out;
    }
    for (const [key, info] of Object.entries(details)) {
      if (info.name) {
        out.push({ key, name: info.name.trim() });
      }
    }
    return out;
  }
}
