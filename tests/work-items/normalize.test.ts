import { describe, expect, it } from 'vitest';
import type { WorkItem } from '../../src/services/project/types.js';
import {
  extractFieldValue,
  isItemRelatedTo,
  isNumericUserKey,
  normalizeApiResult,
  parseRawFieldValue,
  simplifyWorkItem,
} from '../../src/shared/work-items/normalize.js';

describe('normalizeApiResult', () => {
  it('accepts a bare list and counts invalid entries', () => {
    const page = normalizeApiResult([{ id: 1 }, { id: '2', name: 'two' }, { name: 'no id' }], 1, 50);
    expect(page.items.map((i) => i.id)).toEqual([1, 2]);
    expect(page).toMatchObject({ total: 3, pageNum: 1, pageSize: 50, dropped: 1, unexpected: false });
  });

  it('reads pagination from a paged object', () => {
    const page = normalizeApiResult(
      { work_items: [{ id: 5 }], pagination: { total: 40, page_num: 2, page_size: 10 } },
      1,
      50,
    );
    expect(page).toMatchObject({ total: 40, pageNum: 2, pageSize: 10, unexpected: false });
    expect(page.items).toHaveLength(1);
  });

  it('falls back to a top-level total', () => {
    const page = normalizeApiResult({ work_items: [{ id: 5 }, { id: 6 }], total: 7 }, 3, 2);
    expect(page).toMatchObject({ total: 7, pageNum: 3, pageSize: 2 });
  });

  it('flags results of an unexpected shape', () => {
    expect(normalizeApiResult('oops', 1, 50)).toEqual({
      items: [],
      total: 0,
      pageNum: 1,
      pageSize: 50,
      dropped: 0,
      unexpected: true,
    });
    expect(normalizeApiResult(null, 1, 50).unexpected).toBe(true);
  });
});

describe('parseRawFieldValue', () => {
  it.each([
    [{ label: 'High', value: 'opt_high' }, 'High'],
    [{ value: 3 }, '3'],
    [[{ name: 'Ann' }], 'Ann'],
    [[], undefined],
    ['', undefined],
    [0, undefined],
    [null, undefined],
    ['x', 'x'],
    [12, '12'],
  ])('%j -> %s', (value, expected) => {
    expect(parseRawFieldValue(value)).toBe(expected);
  });
});

describe('field access', () => {
  const item: WorkItem = {
    id: 1,
    name: 'Item',
    fields: [
      { field_key: 'status', field_value: { label: 'Open', value: 'open' } },
      { field_key: 'field_related', field_value: ['12', 77] },
    ],
    field_value_pairs: [{ field_key: 'priority', field_value: { label: 'P1', value: 'opt_p1' } }],
  };

  it('prefers fields over legacy pairs', () => {
    expect(extractFieldValue(item, 'status')).toBe('Open');
    expect(extractFieldValue(item, 'priority')).toBe('P1');
    expect(extractFieldValue(item, 'owner')).toBeUndefined();
  });

  it('detects relations by id in scalars and lists', () => {
    expect(isItemRelatedTo(item, 77)).toBe(true);
    expect(isItemRelatedTo(item, 12)).toBe(true);
    expect(isItemRelatedTo(item, 13)).toBe(false);
  });

  it('simplifies an item and truncates long priorities', () => {
    const long: WorkItem = {
      id: 2,
      fields: [
        { field_key: 'priority', field_value: { label: 'x'.repeat(30) } },
        { field_key: 'owner', field_value: 'user_alice' },
      ],
    };
    expect(simplifyWorkItem(long)).toEqual({
      id: 2,
      name: null,
      status: null,
      priority: 'x'.repeat(20),
      owner: 'user_alice',
    });
  });

  it('reads summary fields under custom keys', () => {
    expect(simplifyWorkItem(item, { priority: 'status' }).priority).toBe('Open');
  });
});

describe('isNumericUserKey', () => {
  it('requires more than ten digits', () => {
    expect(isNumericUserKey('12345678901')).toBe(true);
    expect(isNumericUserKey('1234567890')).toBe(false);
    expect(isNumericUserKey('user_1234567890123')).toBe(false);
  });
});
