/**
 * Wire shapes of the work-tracking open API, validated with zod.
 * Objects pass unknown keys through; the service adds fields over time.
 */

import { z } from 'zod';

const itemId = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((v) => Number(v)),
]);

export const EnvelopeSchema = z
  .object({
    err_code: z.number().optional(),
    err_msg: z.string().nullish(),
    data: z.unknown().optional(),
  })
  .passthrough();

// ─────────────────────────────────────────────────────────────────────────────
// Workspaces and types
// ─────────────────────────────────────────────────────────────────────────────

export const WorkspaceKeysSchema = z.array(z.string());

export const WorkspaceDetailsSchema = z.union([
  z.record(z.string(), z.object({ name: z.string().nullish() }).passthrough()),
  z.array(
    z.object({ project_key: z.string(), name: z.string().nullish() }).passthrough(),
  ),
]);

export const WorkItemTypesSchema = z.array(
  z
    .object({
      name: z.string().nullish(),
      type_key: z.string().nullish(),
    })
    .passthrough(),
);

// ─────────────────────────────────────────────────────────────────────────────
// Fields
// ─────────────────────────────────────────────────────────────────────────────

export interface RawOption {
  label?: string | null;
  value?: string | null;
  children?: unknown[] | null;
}

/** Options are validated one by one while flattening; malformed entries are skipped. */
export const RawOptionSchema: z.ZodType<RawOption, z.ZodTypeDef, unknown> = z
  .object({
    label: z.string().nullish(),
    value: z
      .union([z.string(), z.number()])
      .nullish()
      .transform((v) => (v === null || v === undefined ? v : String(v))),
    children: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export const FieldDefinitionSchema = z
  .object({
    field_name: z.string().nullish(),
    field_key: z.string().nullish(),
    field_alias: z.string().nullish(),
    field_type_key: z.string().nullish(),
    options: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export type RawFieldDefinition = z.infer<typeof FieldDefinitionSchema>;

export const FieldDefinitionsSchema = z.array(FieldDefinitionSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Users
// ─────────────────────────────────────────────────────────────────────────────

export const UserSchema = z
  .object({
    user_key: z.string().nullish(),
    name_cn: z.string().nullish(),
    name_en: z.string().nullish(),
    name: z.string().nullish(),
    email: z.string().nullish(),
  })
  .passthrough();

export type RawUser = z.infer<typeof UserSchema>;

export const UsersSchema = z.array(UserSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Work items
// ─────────────────────────────────────────────────────────────────────────────

export const WorkItemFieldSchema = z
  .object({
    field_key: z.string().nullish(),
    field_value: z.unknown(),
    field_type_key: z.string().nullish(),
    field_alias: z.string().nullish(),
  })
  .passthrough();

export type WorkItemField = z.infer<typeof WorkItemFieldSchema>;

export const WorkItemSchema = z
  .object({
    id: itemId,
    name: z.string().nullish(),
    project_key: z.string().nullish(),
    work_item_type_key: z.string().nullish(),
    fields: z.array(WorkItemFieldSchema).nullish(),
    field_value_pairs: z.array(WorkItemFieldSchema).nullish(),
  })
  .passthrough();

export type WorkItem = z.infer<typeof WorkItemSchema>;

export const WorkItemsSchema = z.array(WorkItemSchema);

export const CreatedItemSchema = z.union([
  itemId,
  z.array(z.object({ id: itemId }).passthrough()),
  z.object({ id: itemId }).passthrough(),
]);

/** One field write as the update endpoint takes it. */
export interface FieldValuePair {
  field_key: string;
  field_value: unknown;
}

export interface SearchParam {
  field_key: string;
  operator: 'IN';
  value: unknown[];
}

export interface SearchGroup {
  conjunction: 'AND';
  search_params: SearchParam[];
  search_groups: SearchGroup[];
}

export interface FilterRequest {
  workItemTypeKeys: string[];
  pageNum: number;
  pageSize: number;
  workItemName?: string;
  workItemStatus?: unknown[];
  fields?: string[];
}

export interface SearchRequest {
  typeKey: string;
  searchGroup: SearchGroup;
  pageNum: number;
  pageSize: number;
  fields?: string[];
}
