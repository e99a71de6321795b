import { describe, expect, it, vi } from 'vitest';
import type { FilterRequest, WorkItem } from '../../src/services/project/types.js';
import {
  findItemAcrossTypes,
  findItemNamesAcrossTypes,
  type RelationScanLimits,
  scanRelatedItems,
} from '../../src/shared/work-items/cross-type.js';
import { captureLogger, silentLogger } from '../mocks/logger.js';

const WS = 'project_alpha';

function typeMap(count: number): Map<string, string> {
  return new Map(Array.from({ length: count }, (_, i) => [`Type ${i + 1}`, `t${i + 1}`]));
}

function lookupDeps(types: Map<string, string>, query: (typeKey: string, ids: number[]) => Promise<WorkItem[]>) {
  const queryMock = vi.fn((_ws: string, typeKey: string, ids: number[]) => query(typeKey, ids));
  return {
    deps: {
      meta: { listTypes: vi.fn(async () => new Map(types)) },
      workItems: { query: queryMock },
      logger: silentLogger,
    },
    queriedTypes: () => queryMock.mock.calls.map(([, typeKey]) => typeKey),
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Cross-type lookup
// ─────────────────────────────────────────────────────────────────────────────

describe('findItemAcrossTypes', () => {
  it('returns the item from the preferred type without listing types', async () => {
    const { deps, queriedTypes } = lookupDeps(typeMap(3), async (typeKey) =>
      typeKey === 't1' ? [{ id: 9, name: 'Found' }] : [],
    );
    const found = await findItemAcrossTypes(deps, WS, 't1', 9);
    expect(found).toEqual({ item: { id: 9, name: 'Found' }, typeKey: 't1' });
    expect(queriedTypes()).toEqual(['t1']);
    expect(deps.meta.listTypes).not.toHaveBeenCalled();
  });

  it('stops after the first batch with a hit', async () => {
    const { deps, queriedTypes } = lookupDeps(typeMap(12), async (typeKey) =>
      typeKey === 't3' ? [{ id: 9, name: 'Found' }] : [],
    );
    const found = await findItemAcrossTypes(deps, WS, 't1', 9);
    expect(found?.typeKey).toBe('t3');
    expect(queriedTypes()).toEqual(['t1', 't2', 't3', 't4', 't5', 't6']);
  });

  it('treats a failed query as a miss', async () => {
    const { deps } = lookupDeps(typeMap(4), async (typeKey) => {
      if (typeKey === 't2') {
        throw new Error('boom');
      }
      return typeKey === 't4' ? [{ id: 9 }] : [];
    });
    expect((await findItemAcrossTypes(deps, WS, 't1', 9))?.typeKey).toBe('t4');
  });

  it('returns undefined when no type holds the item', async () => {
    const { deps, queriedTypes } = lookupDeps(typeMap(7), async () => []);
    expect(await findItemAcrossTypes(deps, WS, 't1', 9, 3)).toBeUndefined();
    expect(queriedTypes()).toHaveLength(7);
  });
});

describe('findItemNamesAcrossTypes', () => {
  it('looks only for ids the preferred type did not return', async () => {
    const stored: Record<string, WorkItem[]> = {
      t1: [{ id: 1, name: 'one' }],
      t2: [{ id: 2, name: 'two' }],
    };
    const { deps } = lookupDeps(typeMap(3), async (typeKey, ids) =>
      (stored[typeKey] ?? []).filter((item) => ids.includes(item.id)),
    );

    const names = await findItemNamesAcrossTypes(deps, WS, 't1', [1, 2, 3]);

    expect([...names.entries()]).toEqual([
      [1, 'one'],
      [2, 'two'],
    ]);
    expect(deps.workItems.query.mock.calls.map(([, typeKey, ids]) => [typeKey, ids])).toEqual([
      ['t1', [1, 2, 3]],
      ['t2', [2, 3]],
      ['t3', [2, 3]],
    ]);
  });

  it('skips the type listing when everything was found', async () => {
    const { deps } = lookupDeps(typeMap(3), async () => [{ id: 5, name: 'five' }]);
    expect((await findItemNamesAcrossTypes(deps, WS, 't1', [5])).get(5)).toBe('five');
    expect(deps.meta.listTypes).not.toHaveBeenCalled();
  });

  it('returns an empty map for no ids', async () => {
    const { deps } = lookupDeps(typeMap(3), async () => []);
    expect((await findItemNamesAcrossTypes(deps, WS, 't1', [])).size).toBe(0);
    expect(deps.workItems.query).not.toHaveBeenCalled();
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Relation scan
// ─────────────────────────────────────────────────────────────────────────────

const related = (id: number): WorkItem => ({ id, fields: [{ field_key: 'field_related', field_value: ['77'] }] });
const unrelated = (id: number): WorkItem => ({ id, fields: [{ field_key: 'field_related', field_value: [12] }] });

function scanDeps(pages: Record<number, unknown[] | Error>, logger = silentLogger) {
  const filter = vi.fn(async (_ws: string, request: FilterRequest): Promise<unknown> => {
    const page = pages[request.pageNum] ?? [];
    if (page instanceof Error) {
      throw page;
    }
    return page;
  });
  return { workItems: { filter }, logger };
}

function limits(overrides: Partial<RelationScanLimits>): RelationScanLimits {
  return { maxItems: 100, maxPages: 10, pageSize: 2, pagesInFlight: 3, ...overrides };
}

describe('scanRelatedItems', () => {
  it('keeps related items and stops on a short page', async () => {
    const deps = scanDeps({ 1: [related(1), unrelated(2)], 2: [unrelated(3), related(4)], 3: [related(5)] });
    const result = await scanRelatedItems(deps, WS, 'issue', 77, limits({}));

    expect(result.items.map((i) => i.id)).toEqual([1, 4, 5]);
    expect(result).toMatchObject({ scanned: 5, pagesFetched: 3, incomplete: false });
    expect(result.hint).toBe(
      'Found 3 items related to 77 (scanned 5 items, max 100). To search more items, add name_keyword, status, or priority filters.',
    );
    expect(deps.workItems.filter).toHaveBeenCalledTimes(3);
  });

  it('fetches the next batch only after full pages', async () => {
    const deps = scanDeps({ 1: [unrelated(1)], 2: [unrelated(2)] });
    await scanRelatedItems(deps, WS, 'issue', 77, limits({ pageSize: 1, pagesInFlight: 2 }));
    expect(deps.workItems.filter.mock.calls.map(([, request]) => request.pageNum)).toEqual([1, 2, 3, 4]);
  });

  it('counts malformed entries toward a full page', async () => {
    const { logger, events } = captureLogger();
    const deps = scanDeps({ 1: [related(1), { name: 'no id' }], 2: [related(2)] }, logger);
    const result = await scanRelatedItems(deps, WS, 'issue', 77, limits({ pagesInFlight: 1 }));

    expect(result.items.map((i) => i.id)).toEqual([1, 2]);
    expect(result).toMatchObject({ scanned: 2, pagesFetched: 2 });
    expect(deps.workItems.filter.mock.calls.map(([, request]) => request.pageNum)).toEqual([1, 2]);
    expect(events()).toContain('relation_scan_items_dropped');
  });

  it('stops after a batch with a failed page', async () => {
    const deps = scanDeps({
      1: [related(1), unrelated(2)],
      2: new Error('HTTP 500'),
      3: [unrelated(3), unrelated(4)],
    });
    const result = await scanRelatedItems(deps, WS, 'issue', 77, limits({}));

    expect(result).toMatchObject({ scanned: 4, pagesFetched: 2, incomplete: true });
    expect(result.items.map((i) => i.id)).toEqual([1]);
    expect(deps.workItems.filter).toHaveBeenCalledTimes(3);
  });

  it('respects the page bound', async () => {
    const full = [unrelated(1), unrelated(2)];
    const deps = scanDeps({ 1: full, 2: full, 3: full, 4: full, 5: full });
    await scanRelatedItems(deps, WS, 'issue', 77, limits({ maxPages: 4 }));
    expect(deps.workItems.filter.mock.calls.map(([, request]) => request.pageNum)).toEqual([1, 2, 3, 4]);
  });

  it('respects the item bound', async () => {
    const full = [unrelated(1), unrelated(2)];
    const deps = scanDeps({ 1: full, 2: full, 3: full });
    const result = await scanRelatedItems(deps, WS, 'issue', 77, limits({ maxItems: 4, pagesInFlight: 2 }));
    expect(result.scanned).toBe(4);
    expect(deps.workItems.filter).toHaveBeenCalledTimes(2);
  });

  it('warns about large scans with few matches', async () => {
    const { logger, events } = captureLogger();
    const page = Array.from({ length: 50 }, (_, i) => unrelated(i + 1));
    const pages: Record<number, WorkItem[]> = {};
    for (let p = 1; p <= 10; p++) {
      pages[p] = page;
    }
    const result = await scanRelatedItems(scanDeps(pages, logger), WS, 'issue', 77, {
      maxItems: 300,
      maxPages: 10,
      pageSize: 50,
      pagesInFlight: 3,
    });
    expect(result.scanned).toBe(300);
    expect(events()).toContain('relation_scan_low_yield');
  });
});
