/**
 * Update orchestration.
 *
 * A batch of edits is resolved once (not once per item). A single item is
 * written with one compound call; if that call fails for any reason, or
 * when several items are targeted, each (item, field) pair is written on
 * its own behind the shared concurrency gate, retrying rate-limited calls
 * with exponential backoff. Every attempt yields an UpdateResult; only a
 * batch with nothing resolvable raises.
 */

import type { WorkItemApi } from '../../services/project/api/work-items.js';
import type { FieldValuePair } from '../../services/project/types.js';
import {
  type ConcurrencyGate,
  delay,
  makeConcurrencyGate,
  withRetry,
} from '../../utils/limits.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { MetadataCache } from '../metadata/cache.js';
import { describeWriteError, isRateLimitError, MetadataError } from '../metadata/errors.js';
import {
  type FieldInput,
  type FieldMetadataSource,
  type FieldValue,
  resolveFieldValueForUpdate,
  toWireValue,
} from './field-values.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UpdateResult {
  success: boolean;
  itemId: number;
  fieldName: string;
  message: string;
  /** Attempted value: wire form for writes, raw input for resolution failures */
  value?: unknown;
}

/** Human-level edits; every present key is one field write. */
export interface UpdateRequest {
  name?: string;
  description?: string;
  priority?: string;
  status?: string;
  /** Name or email; written to the fixed `owner` field */
  assignee?: string;
  /** Field name or alias -> value */
  extraFields?: Record<string, FieldInput>;
}

export interface ResolvedField {
  fieldName: string;
  fieldKey: string;
  value: FieldValue;
}

export interface FieldFailure {
  fieldName: string;
  message: string;
  value?: unknown;
}

export interface ItemScope {
  workspaceKey: string;
  typeKey: string;
}

export type UpdateMetadataSource = FieldMetadataSource &
  Pick<MetadataCache, 'resolveFieldKey' | 'hasField'>;

/**
 * No field of the batch could be resolved; nothing was written.
 */
export class UpdateRejectedError extends MetadataError {
  readonly code = 'UPDATE_REJECTED';
  readonly failures: UpdateResult[];

  constructor(failures: UpdateResult[]) {
    const names = [...new Set(failures.map((f) => f.fieldName))];
    super(
      names.length > 0
        ? `No field could be resolved for update: ${names.join(', ')}`
        : 'No fields to update',
      { hint: 'Use get_field_options to check field names and option labels' },
    );
    this.failures = failures;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), failures: this.failures };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

export const NAME_FIELD_KEY = 'name';
export const OWNER_FIELD_KEY = 'owner';

/** Field types that accept an empty value as an explicit clear. */
const CLEARABLE_FIELD_TYPES: ReadonlySet<string> = new Set(['text', 'textarea', 'name', 'multi_select']);

function isEmpty(value: FieldInput | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Resolve every requested field name to a key and every value to its write
 * shape. Failures are collected, never thrown.
 */
export async function resolveUpdateFields(
  meta: UpdateMetadataSource,
  scope: ItemScope,
  request: UpdateRequest,
  log: Logger = rootLogger,
): Promise<{ fields: ResolvedField[]; failures: FieldFailure[] }> {
  const { workspaceKey, typeKey } = scope;
  const fields: ResolvedField[] = [];
  const failures: FieldFailure[] = [];

  const add = async (fieldName: string, input: FieldInput, fixedKey?: string) => {
    const value = typeof input === 'string' ? input.trim() : input;
    try {
      const fieldKey = fixedKey ?? (await meta.resolveFieldKey(workspaceKey, typeKey, fieldName));

      if (fieldKey === NAME_FIELD_KEY) {
        fields.push({ fieldName, fieldKey, value: { kind: 'scalar', value } });
        return;
      }

      if (fixedKey === OWNER_FIELD_KEY) {
        if (isEmpty(value)) {
          await log.info('update_field_skipped_empty', { fieldName });
          return;
        }
        const userKey = await meta.resolveUserKey(String(value), workspaceKey);
        fields.push({ fieldName, fieldKey, value: { kind: 'user-ref', userKey } });
        return;
      }

      const fieldType = await meta.resolveFieldType(workspaceKey, typeKey, fieldKey);
      if (isEmpty(value) && (fieldType === undefined || !CLEARABLE_FIELD_TYPES.has(fieldType))) {
        await log.info('update_field_skipped_empty', { fieldName, fieldType });
        return;
      }

      const resolved = await resolveFieldValueForUpdate(
        meta,
        { workspaceKey, typeKey, fieldKey },
        value,
        log,
      );
      fields.push({ fieldName, fieldKey, value: resolved });
    } catch (error) {
      await log.warning('update_field_unresolved', { fieldName, reason: reason(error) });
      failures.push({
        fieldName,
        message: `Field resolution failed: ${reason(error)}`,
        value: input,
      });
    }
  };

  if (request.name !== undefined) {
    await add('name', request.name, NAME_FIELD_KEY);
  }
  if (request.description !== undefined) {
    await add('description', request.description);
  }
  if (request.priority !== undefined) {
    await add('priority', request.priority);
  }
  if (request.status !== undefined) {
    await add('status', request.status);
  }
  if (request.assignee !== undefined) {
    await add('assignee', request.assignee, OWNER_FIELD_KEY);
  }

  for (const [fieldName, input] of Object.entries(request.extraFields ?? {})) {
    if (!(await meta.hasField(workspaceKey, typeKey, fieldName))) {
      failures.push({ fieldName, message: `Field '${fieldName}' does not exist`, value: input });
      continue;
    }
    await add(fieldName, input);
  }

  return { fields, failures };
}

// ─────────────────────────────────────────────────────────────────────────────
// Orchestrator
// ─────────────────────────────────────────────────────────────────────────────

export interface UpdateOrchestratorOptions {
  meta: UpdateMetadataSource;
  workItems: Pick<WorkItemApi, 'update'>;
  /** Shared write limiter; created from `concurrency` when absent */
  gate?: ConcurrencyGate;
  concurrency?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  /** Pause after each successful single-field write, inside the gate */
  settleDelayMs?: number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_WRITE_CONCURRENCY = 2;

export class UpdateOrchestrator {
  private readonly meta: UpdateMetadataSource;
  private readonly workItems: Pick<WorkItemApi, 'update'>;
  private readonly gate: ConcurrencyGate;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly jitterMs: number;
  private readonly settleDelayMs: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(options: UpdateOrchestratorOptions) {
    this.meta = options.meta;
    this.workItems = options.workItems;
    this.gate = options.gate ?? makeConcurrencyGate(options.concurrency ?? DEFAULT_WRITE_CONCURRENCY);
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.jitterMs = options.jitterMs ?? 1000;
    this.settleDelayMs = options.settleDelayMs ?? 100;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? delay;
    this.log = options.logger ?? rootLogger;
  }

  /**
   * Apply `request` to every item. Resolution failures are replicated for
   * each item; write failures are reported per (item, field).
   *
   * @throws UpdateRejectedError when no requested field resolves
   */
  async update(scope: ItemScope, itemIds: number[], request: UpdateRequest): Promise<UpdateResult[]> {
    if (itemIds.length === 0) {
      return [];
    }

    const { fields, failures } = await resolveUpdateFields(this.meta, scope, request, this.log);

    const results: UpdateResult[] = [];
    for (const itemId of itemIds) {
      for (const failure of failures) {
        results.push({ success: false, itemId, ...failure });
      }
    }

    if (fields.length === 0) {
      throw new UpdateRejectedError(results);
    }

    const [onlyItem] = itemIds;
    if (itemIds.length === 1 && onlyItem !== undefined) {
      const written = await this.tryCompoundWrite(scope, onlyItem, fields);
      if (written) {
        return [...results, ...written];
      }
    }

    const writes = itemIds.flatMap((itemId) =>
      fields.map((field) => this.writeField(scope, itemId, field)),
    );
    await this.log.info('update_individual_writes', { count: writes.length });
    results.push(...(await Promise.all(writes)));
    return results;
  }

  private async tryCompoundWrite(
    scope: ItemScope,
    itemId: number,
    fields: ResolvedField[],
  ): Promise<UpdateResult[] | undefined> {
    const pairs: FieldValuePair[] = fields.map((f) => ({
      field_key: f.fieldKey,
      field_value: toWireValue(f.value),
    }));
    try {
      await this.gate(() => this.workItems.update(scope.workspaceKey, scope.typeKey, itemId, pairs));
    } catch (error) {
      await this.log.warning('update_compound_failed', {
        itemId,
        rateLimited: isRateLimitError(error),
        reason: reason(error),
      });
      return undefined;
    }
    return fields.map((f, i) => ({
      success: true,
      itemId,
      fieldName: f.fieldName,
      message: 'Updated',
      value: pairs[i]?.field_value,
    }));
  }

  private async writeField(scope: ItemScope, itemId: number, field: ResolvedField): Promise<UpdateResult> {
    const fieldValue = toWireValue(field.value);
    const pair: FieldValuePair = { field_key: field.fieldKey, field_value: fieldValue };

    try {
      await withRetry(
        () =>
          this.gate(async () => {
            await this.workItems.update(scope.workspaceKey, scope.typeKey, itemId, [pair]);
            await this.sleep(this.settleDelayMs);
          }),
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.baseDelayMs,
          jitterMs: this.jitterMs,
          random: this.random,
          sleep: this.sleep,
          shouldRetry: (error) => isRateLimitError(error),
          onRetry: (_error, attempt, waitMs) =>
            this.log.warning('update_rate_limited', {
              itemId,
              fieldName: field.fieldName,
              attempt: attempt + 1,
              waitMs: Math.round(waitMs),
            }),
        },
      );
      return {
        success: true,
        itemId,
        fieldName: field.fieldName,
        message: `Field '${field.fieldName}' updated`,
        value: fieldValue,
      };
    } catch (error) {
      const detail = isRateLimitError(error) ? 'retries exhausted' : describeWriteError(error);
      await this.log.error('update_field_failed', {
        itemId,
        fieldName: field.fieldName,
        reason: reason(error),
      });
      return {
        success: false,
        itemId,
        fieldName: field.fieldName,
        message: `Failed to update field '${field.fieldName}': ${detail}`,
        value: fieldValue,
      };
    }
  }
}
