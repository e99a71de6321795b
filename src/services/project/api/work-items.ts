import { z } from 'zod';
import type { RemoteClient } from '../client.js';
import {
  CreatedItemSchema,
  type FieldValuePair,
  type FilterRequest,
  type SearchRequest,
  type WorkItem,
  WorkItemsSchema,
} from '../types.js';
import { callApi } from './request.js';

const ws = (workspaceKey: string) => `/open_api/${encodeURIComponent(workspaceKey)}`;

/**
 * Work item endpoints. Filter and search results are returned unparsed:
 * the service answers with either a bare list or a paginated object, and the
 * provider normalizes both.
 */
export class WorkItemApi {
  constructor(private readonly client: RemoteClient) {}

  /** Returns the new item's id; the service answers with a list, an object or a number. */
  async create(
    workspaceKey: string,
    typeKey: string,
    name: string,
    fieldValuePairs: FieldValuePair[],
  ): Promise<number> {
    const created = await callApi(
      this.client,
      'POST',
      `${ws(workspaceKey)}/work_item/create`,
      {
        work_item_type_key: typeKey,
        name,
        field_value_pairs: fieldValuePairs,
      },
      CreatedItemSchema,
    );
    if (typeof created === 'number') {
      return created;
    }
    if (Array.isArray(created)) {
      const first = created[0];
      if (!first) {
        throw new Error('Create returned an empty list; no work item id available');
      }
      return first.id;
    }
    return created.id;
  }

  async query(
    workspaceKey: string,
    typeKey: string,
    ids: number[],
    expand: Record<string, boolean> = { need_workflow: false },
  ): Promise<WorkItem[]> {
    const items = await callApi(
      this.client,
      'POST',
      `${ws(workspaceKey)}/work_item/${encodeURIComponent(typeKey)}/query`,
      { work_item_ids: ids, expand },
      WorkItemsSchema.nullish(),
    );
    return items ?? [];
  }

  async update(
    workspaceKey: string,
    typeKey: string,
    id: number,
    updateFields: FieldValuePair[],
  ): Promise<void> {
    await callApi(
      this.client,
      'PUT',
      `${ws(workspaceKey)}/work_item/${encodeURIComponent(typeKey)}/${id}`,
      { update_fields: updateFields },
      z.unknown(),
    );
  }

  async delete(workspaceKey: string, typeKey: string, id: number): Promise<void> {
    await callApi(
      this.client,
      'DELETE',
      `${ws(workspaceKey)}/work_item/${encodeURIComponent(typeKey)}/${id}`,
      undefined,
      z.unknown(),
    );
  }

  async filter(workspaceKey: string, request: FilterRequest): Promise<unknown> {
    const body: Record<string, unknown> = {
      work_item_type_keys: request.workItemTypeKeys,
      page_num: request.pageNum,
      page_size: request.pageSize,
    };
    if (request.workItemName) {
      body.work_item_name = request.workItemName;
    }
    if (request.workItemStatus && request.workItemStatus.length > 0) {
      body.work_item_status = request.workItemStatus;
    }
    if (request.fields && request.fields.length > 0) {
      body.fields = request.fields;
    }
    return callApi(this.client, 'POST', `${ws(workspaceKey)}/work_item/filter`, body, z.unknown());
  }

  async searchParams(workspaceKey: string, request: SearchRequest): Promise<unknown> {
    const body: Record<string, unknown> = {
      search_group: request.searchGroup,
      page_num: request.pageNum,
      page_size: request.pageSize,
    };
    if (request.fields && request.fields.length > 0) {
      body.fields = request.fields;
    }
    return callApi(
      this.client,
      'POST',
      `${ws(workspaceKey)}/work_item/${encodeURIComponent(request.typeKey)}/search/params`,
      body,
      z.unknown(),
    );
  }
}
