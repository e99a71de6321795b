import { z } from 'zod';
import { type WorkItem, WorkItemSchema } from '../../services/project/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Result envelopes
// ─────────────────────────────────────────────────────────────────────────────

const PaginationSchema = z
  .object({
    total: z.number().optional(),
    page_num: z.number().optional(),
    page_size: z.number().optional(),
  })
  .passthrough();

const PagedResultSchema = z
  .object({
    work_items: z.array(z.unknown()).nullish(),
    pagination: z.unknown().optional(),
    total: z.number().optional(),
  })
  .passthrough();

export interface NormalizedPage {
  items: WorkItem[];
  total: number;
  pageNum: number;
  pageSize: number;
  /** Entries that failed item validation */
  dropped: number;
  /** The result was neither a list nor a paginated object */
  unexpected: boolean;
}

function parseItems(entries: readonly unknown[]): { items: WorkItem[]; dropped: number } {
  const items: WorkItem[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const parsed = WorkItemSchema.safeParse(entry);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      dropped += 1;
    }
  }
  return { items, dropped };
}

/**
 * Filter and search endpoints answer with either a bare list of items or
 * `{work_items, pagination}`; both become one envelope.
 */
export function normalizeApiResult(result: unknown, pageNum: number, pageSize: number): NormalizedPage {
  if (Array.isArray(result)) {
    const { items, dropped } = parseItems(result);
    return { items, total: result.length, pageNum, pageSize, dropped, unexpected: false };
  }

  const paged = PagedResultSchema.safeParse(result);
  if (!paged.success) {
    return { items: [], total: 0, pageNum, pageSize, dropped: 0, unexpected: true };
  }

  const { items, dropped } = parseItems(paged.data.work_items ?? []);
  const pagination = PaginationSchema.safeParse(paged.data.pagination);
  if (pagination.success) {
    return {
      items,
      total: pagination.data.total ?? items.length,
      pageNum: pagination.data.page_num ?? pageNum,
      pageSize: pagination.data.page_size ?? pageSize,
      dropped,
      unexpected: false,
    };
  }
  return {
    items,
    total: paged.data.total ?? items.length,
    pageNum,
    pageSize,
    dropped,
    unexpected: false,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Field access
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstText(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
    if (typeof value === 'number') {
      return String(value);
    }
  }
  return undefined;
}

/** Display text of a raw field value: option label, first user's name, or the value itself. */
export function parseRawFieldValue(value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (isRecord(value)) {
    return firstText(value, 'label', 'value');
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    const [first] = value;
    if (isRecord(first)) {
      return firstText(first, 'name', 'name_cn');
    }
  }
  if (value === '' || value === 0 || value === false) {
    return undefined;
  }
  return String(value);
}

/** Value of `fieldKey` from `fields`, falling back to legacy `field_value_pairs`. */
export function extractFieldValue(item: WorkItem, fieldKey: string): string | undefined {
  const field = item.fields?.find((f) => f.field_key === fieldKey);
  if (field) {
    return parseRawFieldValue(field.field_value);
  }
  const pair = item.field_value_pairs?.find((p) => p.field_key === fieldKey);
  if (pair) {
    return parseRawFieldValue(pair.field_value);
  }
  return undefined;
}

function sameItemId(value: unknown, itemId: number): boolean {
  if (typeof value === 'number') {
    return value === itemId;
  }
  return typeof value === 'string' && /^\d+$/.test(value) && Number(value) === itemId;
}

/** Whether any field of `item` references `relatedTo`, directly or in a list. */
export function isItemRelatedTo(item: WorkItem, relatedTo: number): boolean {
  for (const field of item.fields ?? []) {
    const value = field.field_value;
    if (Array.isArray(value)) {
      if (value.some((v) => sameItemId(v, relatedTo))) {
        return true;
      }
    } else if (sameItemId(value, relatedTo)) {
      return true;
    }
  }
  return false;
}

// ─────────────────────────────────────────────────────────────────────────────
// Summaries
// ─────────────────────────────────────────────────────────────────────────────

export interface WorkItemSummary {
  id: number;
  name: string | null;
  status: string | null;
  priority: string | null;
  owner: string | null;
}

export const PRIORITY_MAX_LENGTH = 20;

/** Field keys read for summaries; default to the plain names. */
export interface SummaryFieldKeys {
  status?: string;
  priority?: string;
  owner?: string;
}

export function simplifyWorkItem(item: WorkItem, keys: SummaryFieldKeys = {}): WorkItemSummary {
  const priority = extractFieldValue(item, keys.priority ?? 'priority');
  return {
    id: item.id,
    name: item.name ?? null,
    status: extractFieldValue(item, keys.status ?? 'status') ?? null,
    priority: priority ? priority.slice(0, PRIORITY_MAX_LENGTH) : null,
    owner: extractFieldValue(item, keys.owner ?? 'owner') ?? null,
  };
}

/** Owner values made of more than ten digits are user keys, not names. */
export function isNumericUserKey(value: string): boolean {
  return /^\d{11,}$/.test(value);
}
