import type { RemoteClient } from '../client.js';
import { FieldApi } from './fields.js';
import { UserApi } from './users.js';
import { WorkItemTypeApi } from './work-item-types.js';
import { WorkItemApi } from './work-items.js';
import { WorkspaceApi, type WorkspaceApiOptions } from './workspaces.js';

export { callApi } from './request.js';
export { FieldApi } from './fields.js';
export { UserApi } from './users.js';
export { WorkItemTypeApi, type WorkItemTypeSummary } from './work-item-types.js';
export { WorkItemApi } from './work-items.js';
export { WorkspaceApi, type WorkspaceApiOptions, type WorkspaceSummary } from './workspaces.js';

/** All accessors over one client. */
export interface ProjectApis {
  workspaces: WorkspaceApi;
  types: WorkItemTypeApi;
  fields: FieldApi;
  users: UserApi;
  workItems: WorkItemApi;
}

export function createProjectApis(
  client: RemoteClient,
  options: WorkspaceApiOptions = {},
): ProjectApis {
  return {
    workspaces: new WorkspaceApi(client, options),
    types: new WorkItemTypeApi(client),
    fields: new FieldApi(client),
    users: new UserApi(client),
    workItems: new WorkItemApi(client),
  };
}
