/**
 * Work item operations for one (workspace, item type) scope.
 *
 * Callers use names; the provider resolves them through the metadata cache
 * and delegates writes to the shared update orchestrator.
 */

import type { ProjectApis } from '../../services/project/api/index.js';
import type { FieldValuePair, SearchParam, WorkItem } from '../../services/project/types.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { MetadataCache } from '../metadata/cache.js';
import { NotFoundError, notFoundError } from '../metadata/errors.js';
import {
  DEFAULT_SCAN_LIMITS,
  findItemAcrossTypes,
  type RelationScanLimits,
  scanRelatedItems,
} from './cross-type.js';
import {
  extractFieldValue,
  isItemRelatedTo,
  isNumericUserKey,
  normalizeApiResult,
  simplifyWorkItem,
  type WorkItemSummary,
} from './normalize.js';
import { buildReadableDetails, type ReadableWorkItem } from './readable.js';
import type {
  ItemScope,
  UpdateOrchestrator,
  UpdateRequest,
  UpdateResult,
} from './update-orchestrator.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TaskFilters {
  nameKeyword?: string;
  status?: string[];
  priority?: string[];
  /** Name or email */
  owner?: string;
  /** Id of an item the results must reference */
  relatedTo?: number;
  pageNum?: number;
  pageSize?: number;
}

export interface TaskPage {
  items: WorkItem[];
  total: number;
  pageNum: number;
  pageSize: number;
  hint?: string;
}

export interface CreateIssueInput {
  name: string;
  priority?: string;
  description?: string;
  assignee?: string;
}

export interface WorkspaceRef {
  key?: string;
  name?: string;
}

export interface WorkItemProviderOptions {
  apis: Pick<ProjectApis, 'workItems'>;
  meta: MetadataCache;
  orchestrator: UpdateOrchestrator;
  workspace: WorkspaceRef;
  typeName: string;
  /** Type name eligible for the first-available-type fallback */
  defaultTypeName: string;
  scanLimits?: RelationScanLimits;
  logger?: Logger;
}

export const DEFAULT_PRIORITY = 'P2';
export const DEFAULT_PAGE_SIZE = 50;

/** Names the owner field goes by, in lookup order. */
const OWNER_FIELD_CANDIDATES = [
  'owner',
  '\u5f53\u524d\u8d1f\u8d23\u4eba',
  '\u8d1f\u8d23\u4eba',
  '\u7ecf\u529e\u4eba',
  'Assignee',
] as const;

/** Fields fetched alongside list results for client-side filtering and summaries. */
const SUMMARY_FIELDS = ['priority', 'status', 'owner'] as const;

const RELATED_SEARCH_PAGE_SIZE = 5;

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─────────────────────────────────────────────────────────────────────────────
// Provider
// ─────────────────────────────────────────────────────────────────────────────

export class WorkItemProvider {
  private readonly apis: Pick<ProjectApis, 'workItems'>;
  private readonly meta: MetadataCache;
  private readonly orchestrator: UpdateOrchestrator;
  private readonly workspace: WorkspaceRef;
  private readonly typeName: string;
  private readonly defaultTypeName: string;
  private readonly scanLimits: RelationScanLimits;
  private readonly log: Logger;

  private workspaceKeyPromise?: Promise<string>;
  private typeKeyPromise?: Promise<string>;

  constructor(options: WorkItemProviderOptions) {
    if (!options.workspace.key && !options.workspace.name) {
      throw new Error('A workspace key or name is required');
    }
    this.apis = options.apis;
    this.meta = options.meta;
    this.orchestrator = options.orchestrator;
    this.workspace = options.workspace;
    this.typeName = options.typeName;
    this.defaultTypeName = options.defaultTypeName;
    this.scanLimits = options.scanLimits ?? DEFAULT_SCAN_LIMITS;
    this.log = options.logger ?? rootLogger;
  }

  // ─── Scope ─────────────────────────────────────────────────────────────────

  workspaceKey(): Promise<string> {
    const { key, name } = this.workspace;
    if (key) {
      return Promise.resolve(key);
    }
    this.workspaceKeyPromise ??= this.meta.resolveWorkspaceKey(name ?? '').catch((error: unknown) => {
      this.workspaceKeyPromise = undefined;
      throw error;
    });
    return this.workspaceKeyPromise;
  }

  /**
   * Key of the configured type. When the configured type is the default one
   * and the workspace lacks it, the first available type is used instead;
   * either way the answer is memoized.
   */
  typeKey(): Promise<string> {
    this.typeKeyPromise ??= this.resolveTypeKey().catch((error: unknown) => {
      this.typeKeyPromise = undefined;
      throw error;
    });
    return this.typeKeyPromise;
  }

  private async resolveTypeKey(): Promise<string> {
    const workspaceKey = await this.workspaceKey();
    try {
      return await this.meta.resolveTypeKey(workspaceKey, this.typeName);
    } catch (error) {
      if (this.typeName !== this.defaultTypeName || !(error instanceof NotFoundError)) {
        throw error;
      }
      const types = await this.meta.listTypes(workspaceKey);
      const first = types.entries().next();
      if (first.done) {
        throw new NotFoundError({
          entity: 'type',
          query: this.typeName,
          message: `Workspace has no work item types`,
        });
      }
      const [fallbackName, fallbackKey] = first.value;
      await this.log.warning('type_fallback', { requested: this.typeName, using: fallbackName });
      return fallbackKey;
    }
  }

  async scope(): Promise<ItemScope> {
    const workspaceKey = await this.workspaceKey();
    return { workspaceKey, typeKey: await this.typeKey() };
  }

  // ─── Listing ───────────────────────────────────────────────────────────────

  /**
   * List items. `relatedTo` alone runs a bounded relation scan; a name
   * keyword uses the filter endpoint and filters the rest client side;
   * everything else becomes search conditions joined by AND.
   */
  async getTasks(filters: TaskFilters = {}): Promise<TaskPage> {
    const scope = await this.scope();
    const pageNum = filters.pageNum ?? 1;
    const pageSize = filters.pageSize ?? DEFAULT_PAGE_SIZE;
    const status = filters.status?.filter((s) => s !== '') ?? [];
    const priority = filters.priority?.filter((p) => p !== '') ?? [];
    const { nameKeyword, owner, relatedTo } = filters;

    if (relatedTo !== undefined && !nameKeyword && status.length === 0 && priority.length === 0 && !owner) {
      const scan = await scanRelatedItems(
        { workItems: this.apis.workItems, logger: this.log },
        scope.workspaceKey,
        scope.typeKey,
        relatedTo,
        this.scanLimits,
      );
      return {
        items: scan.items,
        total: scan.items.length,
        pageNum: 1,
        pageSize: scan.items.length,
        hint: scan.hint,
      };
    }

    if (nameKeyword) {
      return this.filterByName(scope, { ...filters, nameKeyword, status, priority, pageNum, pageSize });
    }

    const conditions: SearchParam[] = [];
    const statusCondition = status.length > 0 ? await this.buildCondition(scope, 'status', status) : undefined;
    if (statusCondition) {
      conditions.push(statusCondition);
    }
    const priorityCondition =
      priority.length > 0 ? await this.buildCondition(scope, 'priority', priority) : undefined;
    if (priorityCondition) {
      conditions.push(priorityCondition);
    }
    const ownerCondition = owner ? await this.buildOwnerCondition(scope, owner) : undefined;
    if (ownerCondition) {
      conditions.push(ownerCondition);
    }

    const hasFilters = status.length > 0 || priority.length > 0 || Boolean(owner) || relatedTo !== undefined;
    const fieldKeys = hasFilters ? await this.summaryFieldKeys(scope) : new Map<string, string>();

    await this.log.info('get_tasks_search', { conditions: conditions.length, pageNum, pageSize });
    const result = await this.apis.workItems.searchParams(scope.workspaceKey, {
      typeKey: scope.typeKey,
      searchGroup: { conjunction: 'AND', search_params: conditions, search_groups: [] },
      pageNum,
      pageSize,
      fields: [...new Set(fieldKeys.values())],
    });
    const page = await this.normalize(result, pageNum, pageSize);

    const items =
      relatedTo !== undefined ? page.items.filter((item) => isItemRelatedTo(item, relatedTo)) : page.items;
    return { items, total: page.total, pageNum: page.pageNum, pageSize: page.pageSize };
  }

  private async filterByName(
    scope: ItemScope,
    filters: TaskFilters & { nameKeyword: string; status: string[]; priority: string[]; pageNum: number; pageSize: number },
  ): Promise<TaskPage> {
    const { nameKeyword, status, priority, owner, relatedTo, pageNum, pageSize } = filters;

    let workItemStatus: unknown[] | undefined;
    if (status.length > 0) {
      try {
        const statusKey = await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, 'status');
        const resolved: unknown[] = [];
        for (const s of status) {
          resolved.push(await this.resolveFilterValue(scope, statusKey, s));
        }
        workItemStatus = resolved;
      } catch (error) {
        await this.log.warning('status_field_unavailable', { reason: reason(error) });
      }
    }
    if (priority.length > 0 || owner || relatedTo !== undefined) {
      await this.log.info('get_tasks_client_filters', {
        priority: priority.length > 0,
        owner: Boolean(owner),
        relatedTo: relatedTo !== undefined,
      });
    }

    const fieldKeys = await this.summaryFieldKeys(scope);
    const result = await this.apis.workItems.filter(scope.workspaceKey, {
      workItemTypeKeys: [scope.typeKey],
      pageNum,
      pageSize,
      workItemName: nameKeyword,
      workItemStatus,
      fields: [...new Set(fieldKeys.values())],
    });
    const page = await this.normalize(result, pageNum, pageSize);

    let ownerKey: string | undefined;
    if (owner) {
      try {
        ownerKey = await this.meta.resolveUserKey(owner, scope.workspaceKey);
      } catch (error) {
        await this.log.debug('owner_filter_skipped', { reason: reason(error) });
      }
    }
    const priorityKey = fieldKeys.get('priority') ?? 'priority';
    const ownerFieldKey = fieldKeys.get('owner') ?? 'owner';

    const items = page.items.filter((item) => {
      if (priority.length > 0) {
        const value = extractFieldValue(item, priorityKey);
        if (value === undefined || !priority.includes(value)) {
          return false;
        }
      }
      if (owner && ownerKey !== undefined) {
        const value = extractFieldValue(item, ownerFieldKey);
        if (value && value !== ownerKey && !value.toLowerCase().includes(owner.toLowerCase())) {
          return false;
        }
      }
      return relatedTo === undefined || isItemRelatedTo(item, relatedTo);
    });

    return { items, total: page.total, pageNum: page.pageNum, pageSize: page.pageSize };
  }

  private async normalize(result: unknown, pageNum: number, pageSize: number) {
    const page = normalizeApiResult(result, pageNum, pageSize);
    if (page.unexpected) {
      await this.log.warning('unexpected_list_result', { type: typeof result });
    }
    if (page.dropped > 0) {
      await this.log.warning('malformed_items_dropped', { count: page.dropped });
    }
    return page;
  }

  /** Summary field name -> key, for the fields that exist. */
  private async summaryFieldKeys(scope: ItemScope): Promise<Map<string, string>> {
    const keys = new Map<string, string>();
    for (const name of SUMMARY_FIELDS) {
      try {
        keys.set(name, await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, name));
      } catch (error) {
        await this.log.debug('summary_field_missing', { field: name, reason: reason(error) });
      }
    }
    return keys;
  }

  /** Option value for a label, or the label itself for non-option fields. */
  private async resolveFilterValue(scope: ItemScope, fieldKey: string, value: string): Promise<unknown> {
    try {
      return await this.meta.resolveOptionValue(scope.workspaceKey, scope.typeKey, fieldKey, value);
    } catch (error) {
      await this.log.warning('filter_value_unresolved', { fieldKey, value, reason: reason(error) });
      return value;
    }
  }

  private async buildCondition(
    scope: ItemScope,
    fieldName: string,
    values: string[],
  ): Promise<SearchParam | undefined> {
    if (!(await this.meta.hasField(scope.workspaceKey, scope.typeKey, fieldName))) {
      await this.log.warning('filter_field_missing', { field: fieldName });
      return undefined;
    }
    const fieldKey = await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, fieldName);
    const resolved: unknown[] = [];
    for (const value of values) {
      resolved.push(await this.resolveFilterValue(scope, fieldKey, value));
    }
    return { field_key: fieldKey, operator: 'IN', value: resolved };
  }

  private async buildOwnerCondition(scope: ItemScope, owner: string): Promise<SearchParam | undefined> {
    try {
      const userKey = await this.meta.resolveUserKey(owner, scope.workspaceKey);
      const fieldKey = await this.resolveOwnerFieldKey(scope);
      return { field_key: fieldKey, operator: 'IN', value: [userKey] };
    } catch (error) {
      await this.log.warning('owner_filter_skipped', { reason: reason(error) });
      return undefined;
    }
  }

  private async resolveOwnerFieldKey(scope: ItemScope): Promise<string> {
    for (const candidate of OWNER_FIELD_CANDIDATES) {
      if (await this.meta.hasField(scope.workspaceKey, scope.typeKey, candidate)) {
        return this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, candidate);
      }
    }
    return 'owner';
  }

  /**
   * Item id for an id or a name. Names are searched in every type of the
   * workspace at once; an exact name wins over the first partial hit.
   */
  async resolveRelatedTo(value: number | string): Promise<number> {
    if (typeof value === 'number') {
      return value;
    }
    const text = value.trim();
    if (/^\d+$/.test(text)) {
      return Number(text);
    }

    const workspaceKey = await this.workspaceKey();
    const types = [...(await this.meta.listTypes(workspaceKey)).values()];
    const settled = await Promise.allSettled(
      types.map((typeKey) =>
        this.apis.workItems.filter(workspaceKey, {
          workItemTypeKeys: [typeKey],
          pageNum: 1,
          pageSize: RELATED_SEARCH_PAGE_SIZE,
          workItemName: text,
        }),
      ),
    );

    const candidates: WorkItem[] = [];
    for (const [i, outcome] of settled.entries()) {
      if (outcome.status === 'rejected') {
        await this.log.debug('related_search_failed', { typeKey: types[i], reason: reason(outcome.reason) });
        continue;
      }
      const { items } = normalizeApiResult(outcome.value, 1, RELATED_SEARCH_PAGE_SIZE);
      const exact = items.find((item) => item.name === text);
      if (exact) {
        return exact.id;
      }
      candidates.push(...items);
    }

    const [best] = candidates;
    if (best) {
      await this.log.info('related_partial_match', { id: best.id });
      return best.id;
    }
    throw notFoundError('item', text);
  }

  // ─── Writes ────────────────────────────────────────────────────────────────

  /**
   * Create an item and return its id. Priority is written by a follow-up
   * update; if that fails the item still exists and only a warning is logged.
   */
  async createIssue(input: CreateIssueInput): Promise<number> {
    const scope = await this.scope();
    const pairs: FieldValuePair[] = [];

    if (input.description) {
      const fieldKey = await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, 'description');
      pairs.push({ field_key: fieldKey, field_value: input.description });
    }
    if (input.assignee) {
      const userKey = await this.meta.resolveUserKey(input.assignee, scope.workspaceKey);
      pairs.push({ field_key: 'owner', field_value: userKey });
    }

    const id = await this.apis.workItems.create(scope.workspaceKey, scope.typeKey, input.name, pairs);
    await this.log.info('item_created', { id, fields: pairs.length });

    const priority = input.priority ?? DEFAULT_PRIORITY;
    if (priority) {
      try {
        const fieldKey = await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, 'priority');
        const value = await this.resolveFilterValue(scope, fieldKey, priority);
        await this.apis.workItems.update(scope.workspaceKey, scope.typeKey, id, [
          { field_key: fieldKey, field_value: value },
        ]);
      } catch (error) {
        await this.log.warning('priority_update_failed', { id, reason: reason(error) });
      }
    }
    return id;
  }

  async updateIssue(id: number, request: UpdateRequest): Promise<UpdateResult[]> {
    return this.batchUpdateIssues([id], request);
  }

  async batchUpdateIssues(ids: number[], request: UpdateRequest): Promise<UpdateResult[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.orchestrator.update(await this.scope(), ids, request);
  }

  async deleteIssue(id: number): Promise<void> {
    const scope = await this.scope();
    await this.apis.workItems.delete(scope.workspaceKey, scope.typeKey, id);
    await this.log.info('item_deleted', { id });
  }

  // ─── Reads ─────────────────────────────────────────────────────────────────

  /** Option label -> value of a field. */
  async listAvailableOptions(fieldName: string): Promise<Record<string, string>> {
    const scope = await this.scope();
    const fieldKey = await this.meta.resolveFieldKey(scope.workspaceKey, scope.typeKey, fieldName);
    return Object.fromEntries(await this.meta.listOptions(scope.workspaceKey, scope.typeKey, fieldKey));
  }

  /** Raw item, looked up in the configured type first and then across types. */
  async getIssueDetails(id: number): Promise<WorkItem> {
    const scope = await this.scope();
    const found = await findItemAcrossTypes(
      { meta: this.meta, workItems: this.apis.workItems, logger: this.log },
      scope.workspaceKey,
      scope.typeKey,
      id,
    );
    if (!found) {
      throw new NotFoundError({
        entity: 'item',
        query: String(id),
        message: `Item ${id} not found in any work item type`,
      });
    }
    return found.item;
  }

  async getReadableIssueDetails(id: number): Promise<ReadableWorkItem> {
    const item = await this.getIssueDetails(id);
    return buildReadableDetails(
      { meta: this.meta, workItems: this.apis.workItems, logger: this.log },
      await this.scope(),
      item,
    );
  }

  /** Compact summaries; numeric owner keys are replaced by names when known. */
  async simplifyWorkItems(items: readonly WorkItem[]): Promise<WorkItemSummary[]> {
    const summaries = items.map((item) => simplifyWorkItem(item));
    const ownerKeys = summaries
      .map((s) => s.owner)
      .filter((owner): owner is string => owner !== null && isNumericUserKey(owner));
    if (ownerKeys.length === 0) {
      return summaries;
    }
    const names = await this.meta.batchResolveUserNames(ownerKeys);
    return summaries.map((s) => (s.owner !== null && names.has(s.owner) ? { ...s, owner: names.get(s.owner) ?? s.owner } : s));
  }
}
