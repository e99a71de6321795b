/**
 * Field values as a tagged union.
 *
 * Write inputs are resolved into a FieldValue once, at the boundary, and
 * serialized for the update endpoint with `toWireValue`. Values read back
 * from the service are classified into the same union for readable output.
 */

import type { MetadataCache } from '../metadata/cache.js';
import { FieldValidationError } from '../metadata/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type ScalarInput = string | number | boolean | null;

/** What callers may pass for one field. */
export type FieldInput = ScalarInput | ScalarInput[];

export interface OptionRef {
  label: string;
  value: string;
}

export interface RoleOwners {
  role: string;
  owners: string[];
}

export type FieldValue =
  | { kind: 'scalar'; value: unknown }
  | ({ kind: 'option' } & OptionRef)
  | { kind: 'multi-option'; options: OptionRef[] }
  | { kind: 'user-ref'; userKey: string }
  | { kind: 'multi-user-ref'; userKeys: string[] }
  | { kind: 'related-item-ref'; ids: number[]; multiple: boolean }
  | { kind: 'role-owner'; roles: RoleOwners[] }
  | { kind: 'list'; items: FieldValue[] };

export type FieldMetadataSource = Pick<
  MetadataCache,
  'resolveFieldType' | 'resolveFieldName' | 'matchOption' | 'resolveUserKey'
>;

export const MULTI_SELECT = 'multi_select';
export const BOOL = 'bool';

/** Field types whose value is a single user key. */
export const USER_FIELD_TYPES: ReadonlySet<string> = new Set(['user', 'owner', 'creator', 'modifier']);
export const MULTI_USER_FIELD_TYPE = 'multi_user';
export const ROLE_OWNERS_FIELD_TYPE = 'role_owners';
export const RELATED_ITEM_FIELD_TYPES: ReadonlySet<string> = new Set([
  'work_item_related_select',
  'work_item_related_multi_select',
]);

/** Keys treated as user fields when the service reports no field type. */
const USER_FIELD_KEYS: ReadonlySet<string> = new Set([
  'owner',
  'creator',
  'modifier',
  'assignee',
  'created_by',
  'updated_by',
]);

const TRUE_WORDS: ReadonlySet<string> = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'no', 'off', '0']);

const PRIMARY_DELIMITER = ' / ';
const SECONDARY_DELIMITERS = [',', ';', '|'] as const;

// ─────────────────────────────────────────────────────────────────────────────
// Wire encoding
// ─────────────────────────────────────────────────────────────────────────────

export function toWireValue(value: FieldValue): unknown {
  switch (value.kind) {
    case 'scalar':
      return value.value;
    case 'option':
      return { label: value.label, value: value.value };
    case 'multi-option':
      return value.options.map((o) => ({ label: o.label, value: o.value }));
    case 'user-ref':
      return value.userKey;
    case 'multi-user-ref':
      return [...value.userKeys];
    case 'related-item-ref':
      return value.multiple ? [...value.ids] : value.ids[0];
    case 'role-owner':
      return value.roles.map((r) => ({ role: r.role, owners: [...r.owners] }));
    case 'list':
      return value.items.map(toWireValue);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Write resolution
// ─────────────────────────────────────────────────────────────────────────────

function isBlank(input: FieldInput | undefined): boolean {
  return input === null || input === undefined || (typeof input === 'string' && input.trim() === '');
}

/** Parts of a delimited string; " / " wins over the single-character delimiters. */
export function splitDelimited(input: string): string[] {
  const clean = (parts: string[]) => parts.map((p) => p.trim()).filter((p) => p !== '');
  if (input.includes(PRIMARY_DELIMITER)) {
    return clean(input.split(PRIMARY_DELIMITER));
  }
  for (const delimiter of SECONDARY_DELIMITERS) {
    if (input.includes(delimiter)) {
      return clean(input.split(delimiter));
    }
  }
  return [input];
}

function hasDelimiter(input: string): boolean {
  return input.includes(PRIMARY_DELIMITER) || SECONDARY_DELIMITERS.some((d) => input.includes(d));
}

export interface FieldTarget {
  workspaceKey: string;
  typeKey: string;
  fieldKey: string;
}

/**
 * Shape a human value for the update endpoint.
 *
 * Multi-select: blank clears (empty list), lists are flattened into one
 * option list, unknown labels raise. Bool: only the true/false vocabulary
 * is accepted. User fields resolve names to user keys. Other fields try the
 * option set first and fall back to the raw input.
 */
export async function resolveFieldValueForUpdate(
  meta: FieldMetadataSource,
  target: FieldTarget,
  input: FieldInput,
  log: Logger = rootLogger,
): Promise<FieldValue> {
  const { workspaceKey, typeKey, fieldKey } = target;
  const fieldType = await meta.resolveFieldType(workspaceKey, typeKey, fieldKey);

  if (fieldType === MULTI_SELECT && isBlank(input)) {
    await log.info('multi_select_cleared', { fieldKey });
    return { kind: 'multi-option', options: [] };
  }

  if (Array.isArray(input)) {
    const items: FieldValue[] = [];
    for (const element of input) {
      items.push(await resolveFieldValueForUpdate(meta, target, element, log));
    }
    if (fieldType === MULTI_SELECT) {
      return {
        kind: 'multi-option',
        options: items.flatMap((item) => (item.kind === 'multi-option' ? item.options : [])),
      };
    }
    return { kind: 'list', items };
  }

  if (input === null) {
    return { kind: 'scalar', value: null };
  }

  if (fieldType !== undefined && (USER_FIELD_TYPES.has(fieldType) || fieldType === MULTI_USER_FIELD_TYPE)) {
    return resolveUserValue(meta, workspaceKey, fieldType, input);
  }

  if (typeof input === 'string' && hasDelimiter(input)) {
    const whole = await meta.matchOption(workspaceKey, typeKey, fieldKey, input);
    if (whole.kind !== 'match') {
      const parts = splitDelimited(input);
      if (parts.length > 1) {
        await log.info('field_value_split', { fieldKey, parts: parts.length });
        return resolveFieldValueForUpdate(meta, target, parts, log);
      }
    }
  }

  const label = String(input);
  const match = await meta.matchOption(workspaceKey, typeKey, fieldKey, label);
  if (match.kind === 'match') {
    const option: OptionRef = { label, value: match.value };
    return fieldType === MULTI_SELECT
      ? { kind: 'multi-option', options: [option] }
      : { kind: 'option', ...option };
  }

  if (fieldType === BOOL) {
    if (typeof input === 'boolean') {
      return { kind: 'scalar', value: input };
    }
    const word = String(input).toLowerCase();
    if (TRUE_WORDS.has(word)) {
      return { kind: 'scalar', value: true };
    }
    if (FALSE_WORDS.has(word)) {
      return { kind: 'scalar', value: false };
    }
    const fieldName = (await meta.resolveFieldName(workspaceKey, typeKey, fieldKey)) ?? fieldKey;
    await log.warning('invalid_bool_value', { fieldKey, value: label });
    throw new FieldValidationError({
      code: 'INVALID_BOOLEAN',
      message: `Cannot update bool field '${fieldName}': '${label}' is not a boolean`,
      fieldName,
      fieldKey,
      value: input,
      hint: 'Use true/yes/on/1 or false/no/off/0',
    });
  }

  if (fieldType === MULTI_SELECT) {
    const fieldName = (await meta.resolveFieldName(workspaceKey, typeKey, fieldKey)) ?? fieldKey;
    const detail =
      match.kind === 'ambiguous'
        ? `ambiguous, candidates: ${match.candidates.join(', ')}`
        : `available: ${match.available.join(', ')}`;
    throw new FieldValidationError({
      code: 'INVALID_OPTION',
      message: `Cannot update multi-select field '${fieldName}': '${label}' is not an option (${detail})`,
      fieldName,
      fieldKey,
      value: input,
    });
  }

  await log.debug('field_value_raw', { fieldKey, fieldType });
  return { kind: 'scalar', value: input };
}

async function resolveUserValue(
  meta: FieldMetadataSource,
  workspaceKey: string,
  fieldType: string,
  input: string | number | boolean,
): Promise<FieldValue> {
  const identifier = String(input).trim();
  if (fieldType === MULTI_USER_FIELD_TYPE) {
    const userKeys: string[] = [];
    for (const part of splitDelimited(identifier)) {
      userKeys.push(await meta.resolveUserKey(part, workspaceKey));
    }
    return { kind: 'multi-user-ref', userKeys };
  }
  return { kind: 'user-ref', userKey: await meta.resolveUserKey(identifier, workspaceKey) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Read classification
// ─────────────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readText(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return undefined;
}

function asItemId(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  return undefined;
}

/** Label, name or name_cn of an object; lists of one object collapse to it. */
export function extractReadable(value: unknown): unknown {
  if (isRecord(value)) {
    return readText(value, 'label', 'name', 'name_cn') ?? value;
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return value;
    }
    const [only] = value;
    if (value.length === 1 && isRecord(only)) {
      return readText(only, 'name', 'name_cn', 'label') ?? only;
    }
    const items = value.map(extractReadable).filter((v) => v !== null && v !== undefined);
    return items.length > 0 ? items : value;
  }
  return value;
}

function toOptionRef(entry: Record<string, unknown>): OptionRef | undefined {
  const label = readText(entry, 'label', 'name');
  if (label === undefined) {
    return undefined;
  }
  const raw = entry.value;
  return { label, value: typeof raw === 'string' || typeof raw === 'number' ? String(raw) : '' };
}

/**
 * Classify a value read from an item. `fieldType` may be undefined for
 * legacy `field_value_pairs`, in which case well-known keys decide.
 */
export function classifyFieldValue(
  fieldType: string | undefined,
  fieldKey: string,
  raw: unknown,
): FieldValue {
  if (raw === null || raw === undefined) {
    return { kind: 'scalar', value: raw };
  }

  const isUserField =
    fieldType !== undefined ? USER_FIELD_TYPES.has(fieldType) : USER_FIELD_KEYS.has(fieldKey);
  if (isUserField) {
    return typeof raw === 'string'
      ? { kind: 'user-ref', userKey: raw }
      : { kind: 'scalar', value: extractReadable(raw) };
  }

  if (fieldType === MULTI_USER_FIELD_TYPE && Array.isArray(raw)) {
    if (raw.every((u): u is string => typeof u === 'string')) {
      return { kind: 'multi-user-ref', userKeys: raw };
    }
    return { kind: 'list', items: raw.map((u) => classifyFieldValue(undefined, '', u)) };
  }

  if (fieldType === ROLE_OWNERS_FIELD_TYPE && Array.isArray(raw)) {
    const roles: RoleOwners[] = [];
    for (const entry of raw) {
      if (!isRecord(entry) || typeof entry.role !== 'string' || entry.role === '') {
        continue;
      }
      const owners = Array.isArray(entry.owners)
        ? entry.owners.filter((o): o is string => typeof o === 'string')
        : [];
      roles.push({ role: entry.role, owners });
    }
    return { kind: 'role-owner', roles };
  }

  if (fieldType !== undefined && RELATED_ITEM_FIELD_TYPES.has(fieldType)) {
    const entries = Array.isArray(raw) ? raw : [raw];
    const ids = entries.map(asItemId).filter((id): id is number => id !== undefined);
    if (ids.length > 0) {
      return { kind: 'related-item-ref', ids, multiple: Array.isArray(raw) };
    }
    return { kind: 'scalar', value: raw };
  }

  if (isRecord(raw)) {
    const option = toOptionRef(raw);
    if (option) {
      return { kind: 'option', ...option };
    }
  }

  if (Array.isArray(raw) && raw.length > 0 && raw.every(isRecord)) {
    const options = raw.map(toOptionRef);
    if (options.every((o): o is OptionRef => o !== undefined)) {
      return { kind: 'multi-option', options };
    }
  }

  return { kind: 'scalar', value: raw };
}
