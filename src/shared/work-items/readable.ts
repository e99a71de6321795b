/**
 * Readable item details: field keys become field names, user keys become
 * display names, option values become labels, related item ids become item
 * names and role keys become role names. Every lookup is best effort.
 */

import type { WorkItem, WorkItemField } from '../../services/project/types.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { MetadataCache } from '../metadata/cache.js';
import { type CrossTypeDeps, findItemNamesAcrossTypes } from './cross-type.js';
import { classifyFieldValue, type FieldValue } from './field-values.js';
import type { ItemScope } from './update-orchestrator.js';

export interface ReadableDeps extends CrossTypeDeps {
  meta: Pick<
    MetadataCache,
    'listTypes' | 'batchResolveUserNames' | 'resolveFieldName' | 'resolveRoleName'
  >;
}

export type NamedField = WorkItemField & { field_name: string };

export type ReadableWorkItem = WorkItem & {
  fields: NamedField[];
  readable_fields: Record<string, unknown>;
  [readableAlias: `readable_${string}`]: unknown;
};

/** Root-level keys that hold a user key. */
const ROOT_USER_KEYS = ['owner', 'created_by', 'updated_by'] as const;

/** Readable fields copied to `readable_<name>` at the top level. */
const PROMOTED_FIELDS = ['owner', 'creator', 'updater', 'assignee'] as const;

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ClassifiedField {
  field: WorkItemField;
  key: string;
  value: FieldValue;
}

function collectRefs(value: FieldValue, users: Set<string>, itemIds: Set<number>): void {
  switch (value.kind) {
    case 'user-ref':
      users.add(value.userKey);
      break;
    case 'multi-user-ref':
      for (const key of value.userKeys) {
        users.add(key);
      }
      break;
    case 'role-owner':
      for (const role of value.roles) {
        for (const owner of role.owners) {
          users.add(owner);
        }
      }
      break;
    case 'related-item-ref':
      for (const id of value.ids) {
        itemIds.add(id);
      }
      break;
    case 'list':
      for (const item of value.items) {
        collectRefs(item, users, itemIds);
      }
      break;
    default:
      break;
  }
}

export async function buildReadableDetails(
  deps: ReadableDeps,
  scope: ItemScope,
  item: WorkItem,
): Promise<ReadableWorkItem> {
  const log: Logger = deps.logger ?? rootLogger;
  const workspaceKey = item.project_key ?? scope.workspaceKey;
  const typeKey = item.work_item_type_key ?? scope.typeKey;

  const source: WorkItemField[] =
    item.fields && item.fields.length > 0 ? item.fields : (item.field_value_pairs ?? []);

  const classified: ClassifiedField[] = [];
  for (const field of source) {
    if (!field.field_key) {
      continue;
    }
    classified.push({
      field,
      key: field.field_key,
      value: classifyFieldValue(field.field_type_key ?? undefined, field.field_key, field.field_value),
    });
  }

  const userKeys = new Set<string>();
  const itemIds = new Set<number>();
  for (const { value } of classified) {
    collectRefs(value, userKeys, itemIds);
  }
  for (const key of ROOT_USER_KEYS) {
    const value = item[key];
    if (typeof value === 'string' && value !== '') {
      userKeys.add(value);
    }
  }

  const userNames = await deps.meta.batchResolveUserNames([...userKeys]);
  const itemNames = await findItemNamesAcrossTypes(deps, workspaceKey, typeKey, [...itemIds]);
  const userName = (key: string) => userNames.get(key) ?? key;

  const render = async (value: FieldValue): Promise<unknown> => {
    switch (value.kind) {
      case 'scalar':
        return value.value;
      case 'option':
        return value.label;
      case 'multi-option':
        return value.options.map((o) => o.label);
      case 'user-ref':
        return userName(value.userKey);
      case 'multi-user-ref':
        return value.userKeys.map(userName);
      case 'related-item-ref': {
        const names = value.ids.map((id) => itemNames.get(id) ?? id);
        return value.multiple ? names : names[0];
      }
      case 'role-owner': {
        const roles: Array<{ role: string; owners: string[] }> = [];
        for (const role of value.roles) {
          let roleName: string | undefined;
          try {
            roleName = await deps.meta.resolveRoleName(workspaceKey, typeKey, role.role);
          } catch (error) {
            await log.debug('role_name_lookup_failed', { role: role.role, reason: reason(error) });
          }
          roles.push({ role: roleName ?? role.role, owners: role.owners.map(userName) });
        }
        return roles;
      }
      case 'list': {
        const out: unknown[] = [];
        for (const entry of value.items) {
          out.push(await render(entry));
        }
        return out;
      }
    }
  };

  const fields: NamedField[] = [];
  const readableFields: Record<string, unknown> = {};
  for (const { field, key, value } of classified) {
    let fieldName: string | undefined;
    try {
      fieldName = await deps.meta.resolveFieldName(workspaceKey, typeKey, key);
    } catch (error) {
      await log.debug('field_name_lookup_failed', { fieldKey: key, reason: reason(error) });
    }
    fieldName = fieldName || field.field_alias || key;
    fields.push({ ...field, field_name: fieldName });
    readableFields[fieldName] = await render(value);
  }

  for (const key of ROOT_USER_KEYS) {
    const value = item[key];
    if (typeof value === 'string' && value !== '') {
      readableFields[key] = userName(value);
    }
  }

  const enhanced: ReadableWorkItem = { ...item, fields, readable_fields: readableFields };
  for (const name of PROMOTED_FIELDS) {
    if (name in readableFields) {
      enhanced[`readable_${name}`] = readableFields[name];
    }
  }
  return enhanced;
}
