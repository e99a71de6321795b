/**
 * Compensations for two gaps of the remote query language: items addressed
 * by id without a known type, and "related to item X" filters.
 */

import type { WorkItemApi } from '../../services/project/api/work-items.js';
import type { WorkItem } from '../../services/project/types.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { MetadataCache } from '../metadata/cache.js';
import { isItemRelatedTo, normalizeApiResult } from './normalize.js';

export const TYPE_BATCH_SIZE = 5;

export interface CrossTypeDeps {
  meta: Pick<MetadataCache, 'listTypes'>;
  workItems: Pick<WorkItemApi, 'query'>;
  logger?: Logger;
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function chunk<T>(values: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    out.push(values.slice(i, i + size));
  }
  return out;
}

async function otherTypeKeys(deps: CrossTypeDeps, workspaceKey: string, excludeTypeKey: string): Promise<string[]> {
  const types = await deps.meta.listTypes(workspaceKey);
  return [...types.values()].filter((key) => key !== excludeTypeKey);
}

// ─────────────────────────────────────────────────────────────────────────────
// Cross-type lookup
// ─────────────────────────────────────────────────────────────────────────────

export interface FoundItem {
  item: WorkItem;
  typeKey: string;
}

/**
 * Look `itemId` up in `preferredTypeKey`, then in every other type of the
 * workspace, a batch of types at a time. Types of a batch are queried
 * concurrently; a failed query counts as a miss. The first batch with a hit
 * ends the search.
 */
export async function findItemAcrossTypes(
  deps: CrossTypeDeps,
  workspaceKey: string,
  preferredTypeKey: string,
  itemId: number,
  batchSize = TYPE_BATCH_SIZE,
): Promise<FoundItem | undefined> {
  const log = deps.logger ?? rootLogger;

  try {
    const [item] = await deps.workItems.query(workspaceKey, preferredTypeKey, [itemId]);
    if (item) {
      return { item, typeKey: preferredTypeKey };
    }
  } catch (error) {
    await log.debug('item_query_failed', { itemId, typeKey: preferredTypeKey, reason: reason(error) });
  }

  const others = await otherTypeKeys(deps, workspaceKey, preferredTypeKey);
  await log.info('item_cross_type_search', { itemId, types: others.length });

  for (const batch of chunk(others, batchSize)) {
    const settled = await Promise.allSettled(
      batch.map((typeKey) => deps.workItems.query(workspaceKey, typeKey, [itemId])),
    );
    for (const [i, outcome] of settled.entries()) {
      const typeKey = batch[i];
      if (outcome.status === 'fulfilled' && typeKey !== undefined) {
        const [item] = outcome.value;
        if (item) {
          await log.info('item_cross_type_found', { itemId, typeKey });
          return { item, typeKey };
        }
      }
    }
  }
  return undefined;
}

/**
 * Names for many item ids: the preferred type first, then the other types
 * in batches until every id is found. Best effort; failures are logged and
 * unknown ids are left out.
 */
export async function findItemNamesAcrossTypes(
  deps: CrossTypeDeps,
  workspaceKey: string,
  preferredTypeKey: string,
  itemIds: readonly number[],
  batchSize = TYPE_BATCH_SIZE,
): Promise<Map<number, string>> {
  const log = deps.logger ?? rootLogger;
  const names = new Map<number, string>();
  const remaining = new Set(itemIds);
  if (remaining.size === 0) {
    return names;
  }

  const collect = (items: readonly WorkItem[]) => {
    for (const item of items) {
      names.set(item.id, item.name ?? '');
      remaining.delete(item.id);
    }
  };

  try {
    collect(await deps.workItems.query(workspaceKey, preferredTypeKey, [...remaining]));
  } catch (error) {
    await log.debug('related_items_query_failed', { typeKey: preferredTypeKey, reason: reason(error) });
  }
  if (remaining.size === 0) {
    return names;
  }

  let others: string[];
  try {
    others = await otherTypeKeys(deps, workspaceKey, preferredTypeKey);
  } catch (error) {
    await log.warning('related_items_types_failed', { reason: reason(error) });
    return names;
  }

  for (const batch of chunk(others, batchSize)) {
    if (remaining.size === 0) {
      break;
    }
    const ids = [...remaining];
    const settled = await Promise.allSettled(
      batch.map((typeKey) => deps.workItems.query(workspaceKey, typeKey, ids)),
    );
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        collect(outcome.value);
      }
    }
  }

  if (remaining.size > 0) {
    await log.debug('related_items_unresolved', { count: remaining.size });
  }
  return names;
}

// ─────────────────────────────────────────────────────────────────────────────
// Bounded relation scan
// ─────────────────────────────────────────────────────────────────────────────

export interface RelationScanLimits {
  maxItems: number;
  maxPages: number;
  pageSize: number;
  pagesInFlight: number;
}

export const DEFAULT_SCAN_LIMITS: RelationScanLimits = {
  maxItems: 500,
  maxPages: 10,
  pageSize: 50,
  pagesInFlight: 3,
};

/** Scans above this many items with fewer than LOW_YIELD_MATCHES matches are flagged. */
const LOW_YIELD_SCANNED = 200;
const LOW_YIELD_MATCHES = 5;

export interface RelationScanResult {
  items: WorkItem[];
  scanned: number;
  pagesFetched: number;
  /** A page failed and the scan stopped before the limits */
  incomplete: boolean;
  hint: string;
}

export interface RelationScanDeps {
  workItems: Pick<WorkItemApi, 'filter'>;
  logger?: Logger;
}

/**
 * Fetch pages of `typeKey` a few at a time and keep the items whose fields
 * reference `relatedTo`. A batch containing an empty or short page ends
 * the scan; so does a batch with a failed page.
 */
export async function scanRelatedItems(
  deps: RelationScanDeps,
  workspaceKey: string,
  typeKey: string,
  relatedTo: number,
  limits: RelationScanLimits = DEFAULT_SCAN_LIMITS,
): Promise<RelationScanResult> {
  const log = deps.logger ?? rootLogger;
  const found: WorkItem[] = [];
  let scanned = 0;
  let pagesFetched = 0;
  let incomplete = false;
  let page = 1;

  await log.warning('relation_scan_started', { relatedTo, maxItems: limits.maxItems });

  while (scanned < limits.maxItems && page <= limits.maxPages) {
    const end = Math.min(page + limits.pagesInFlight, limits.maxPages + 1);
    const pageNums: number[] = [];
    for (let p = page; p < end; p++) {
      pageNums.push(p);
    }

    const settled = await Promise.allSettled(
      pageNums.map((pageNum) =>
        deps.workItems.filter(workspaceKey, {
          workItemTypeKeys: [typeKey],
          pageNum,
          pageSize: limits.pageSize,
        }),
      ),
    );

    let endOfData = false;
    let failed = false;
    for (const [i, outcome] of settled.entries()) {
      const pageNum = pageNums[i] ?? page + i;
      if (outcome.status === 'rejected') {
        await log.error('relation_scan_page_failed', { pageNum, reason: reason(outcome.reason) });
        failed = true;
        continue;
      }
      pagesFetched += 1;
      const { items, dropped } = normalizeApiResult(outcome.value, pageNum, limits.pageSize);
      scanned += items.length;
      found.push(...items.filter((item) => isItemRelatedTo(item, relatedTo)));
      if (dropped > 0) {
        await log.warning('relation_scan_items_dropped', { pageNum, dropped });
      }
      // Malformed entries still occupy the page.
      if (items.length + dropped < limits.pageSize) {
        endOfData = true;
      }
    }

    await log.debug('relation_scan_batch', { firstPage: page, lastPage: end - 1, scanned, found: found.length });

    if (failed) {
      incomplete = true;
    }
    if (endOfData) {
      break;
    }
    if (failed) {
      await log.warning('relation_scan_stopped_on_error', { scanned });
      break;
    }
    page += limits.pagesInFlight;
  }

  if (scanned > LOW_YIELD_SCANNED && found.length < LOW_YIELD_MATCHES) {
    await log.warning('relation_scan_low_yield', { scanned, found: found.length });
  }

  return {
    items: found,
    scanned,
    pagesFetched,
    incomplete,
    hint:
      `Found ${found.length} items related to ${relatedTo} ` +
      `(scanned ${scanned} items, max ${limits.maxItems}). ` +
      'To search more items, add name_keyword, status, or priority filters.',
  };
}
