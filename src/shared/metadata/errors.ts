/**
 * Error classes for metadata resolution, field validation and remote calls.
 *
 * Every error carries a machine-readable code plus optional hint and
 * suggestion fields so tool handlers can surface recovery steps.
 */

import { maskIdentifiers } from '../../utils/masking.js';

/**
 * Base class for errors raised by this package.
 */
export abstract class MetadataError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Human-readable hint for resolution */
  readonly hint?: string;

  /** Suggested action to resolve the error */
  readonly suggestion?: string;

  constructor(message: string, options?: { hint?: string; suggestion?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.hint = options?.hint;
    this.suggestion = options?.suggestion;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Structured form for tool responses. Messages are masked.
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: maskIdentifiers(this.message),
      hint: this.hint === undefined ? undefined : maskIdentifiers(this.hint),
      suggestion: this.suggestion,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

export type NotFoundErrorCode =
  | 'WORKSPACE_NOT_FOUND'
  | 'TYPE_NOT_FOUND'
  | 'FIELD_NOT_FOUND'
  | 'OPTION_NOT_FOUND'
  | 'ROLE_NOT_FOUND'
  | 'USER_NOT_FOUND'
  | 'ITEM_NOT_FOUND';

export type EntityKind = 'workspace' | 'type' | 'field' | 'option' | 'role' | 'user' | 'item';

const CODE_BY_KIND: Record<EntityKind, NotFoundErrorCode> = {
  workspace: 'WORKSPACE_NOT_FOUND',
  type: 'TYPE_NOT_FOUND',
  field: 'FIELD_NOT_FOUND',
  option: 'OPTION_NOT_FOUND',
  role: 'ROLE_NOT_FOUND',
  user: 'USER_NOT_FOUND',
  item: 'ITEM_NOT_FOUND',
};

/**
 * A human-readable name could not be mapped to an opaque key.
 *
 * @example
 * ```typescript
 * throw notFoundError('option', 'P5', ['P0', 'P1', 'P2']);
 * // Option 'P5' not found. Available: P0, P1, P2
 * ```
 */
export class NotFoundError extends MetadataError {
  readonly code: NotFoundErrorCode;
  readonly entity: EntityKind;
  readonly query: string;
  /** Names the caller could use instead */
  readonly available: string[];
  /** Labels that matched ambiguously, when fuzzy matching refused to pick */
  readonly candidates: string[];

  constructor(options: {
    entity: EntityKind;
    query: string;
    available?: string[];
    candidates?: string[];
    message?: string;
    hint?: string;
    suggestion?: string;
  }) {
    const available = options.available ?? [];
    const candidates = options.candidates ?? [];
    super(options.message ?? describeNotFound(options.entity, options.query, available, candidates), {
      hint: options.hint,
      suggestion: options.suggestion,
    });
    this.code = CODE_BY_KIND[options.entity];
    this.entity = options.entity;
    this.query = options.query;
    this.available = available;
    this.candidates = candidates;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      entity: this.entity,
      available: this.available,
      candidates: this.candidates.length > 0 ? this.candidates : undefined,
    };
  }
}

function describeNotFound(
  entity: EntityKind,
  query: string,
  available: string[],
  candidates: string[],
): string {
  const label = entity.charAt(0).toUpperCase() + entity.slice(1);
  if (candidates.length > 1) {
    return `${label} '${query}' is ambiguous. Candidates: ${candidates.join(', ')}`;
  }
  if (available.length === 0) {
    return `${label} '${query}' not found`;
  }
  return `${label} '${query}' not found. Available: ${available.join(', ')}`;
}

export function notFoundError(
  entity: EntityKind,
  query: string,
  available: string[] = [],
  candidates: string[] = [],
): NotFoundError {
  return new NotFoundError({ entity, query, available, candidates });
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type FieldValidationErrorCode = 'INVALID_BOOLEAN' | 'INVALID_OPTION';

/**
 * A value could not be shaped for a specific field. Never coerced silently.
 */
export class FieldValidationError extends MetadataError {
  readonly code: FieldValidationErrorCode;
  readonly fieldName: string;
  readonly fieldKey?: string;
  readonly value: unknown;

  constructor(options: {
    code: FieldValidationErrorCode;
    message: string;
    fieldName: string;
    fieldKey?: string;
    value?: unknown;
    hint?: string;
  }) {
    super(options.message, { hint: options.hint });
    this.code = options.code;
    this.fieldName = options.fieldName;
    this.fieldKey = options.fieldKey;
    this.value = options.value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      fieldName: this.fieldName,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Remote
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The service answered, but with a non-zero embedded err_code.
 */
export class RemoteApiError extends MetadataError {
  readonly code = 'REMOTE_API_ERROR';
  readonly errCode: number;
  readonly path: string;
  /** Parsed response body */
  readonly body: unknown;

  constructor(options: { path: string; errCode: number; errMsg: string; body: unknown }) {
    super(`Remote call ${options.path} failed (err_code=${options.errCode}): ${options.errMsg}`);
    this.errCode = options.errCode;
    this.path = options.path;
    this.body = options.body;
  }
}

/**
 * HTTP status >= 400 that survived transport retries.
 */
export class RemoteHttpError extends MetadataError {
  readonly code = 'REMOTE_HTTP_ERROR';
  readonly status: number;
  readonly path: string;
  readonly body: unknown;

  constructor(options: { status: number; path: string; body: unknown; statusText?: string }) {
    const text = options.statusText ? ` ${options.statusText}` : '';
    super(`HTTP ${options.status}${text} for url ${options.path}`);
    this.status = options.status;
    this.path = options.path;
    this.body = options.body;
  }
}

/**
 * Timeout or connection failure after all transport attempts.
 */
export class TransportError extends MetadataError {
  readonly code = 'TRANSPORT_ERROR';
  readonly path: string;

  constructor(options: { path: string; cause: unknown }) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Request to ${options.path} failed: ${reason}`, {
      cause: options.cause,
      hint: 'Check network connectivity and PROJECT_API_BASE_URL',
    });
    this.path = options.path;
  }
}

/**
 * HTTP 429, or an error whose text carries the rate-limit status line.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RemoteHttpError) {
    return error.status === 429;
  }
  const text = error instanceof Error ? error.message : String(error);
  return text.includes('429') && text.includes('Too Many Requests');
}

function readString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten the service's nested error body into one line.
 * `{err_msg, err: {msg}}` becomes `err_msg: msg` when the two differ.
 */
export function remoteErrorDetail(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const outer = readString(body, 'err_msg', 'msg');
  const inner = isRecord(body.err) ? readString(body.err, 'msg', 'err_msg') : undefined;
  if (outer && inner && outer !== inner) {
    return `${outer}: ${inner}`;
  }
  return inner ?? outer;
}

const LOCKED_FIELD_NOTE = ' (field may be locked by the workflow, read-only, or lacking permission)';

/**
 * User-facing text for a failed write: the remote detail when the body
 * carries one, otherwise the error message without its request URL.
 */
export function describeWriteError(error: unknown): string {
  const body =
    error instanceof RemoteApiError || error instanceof RemoteHttpError ? error.body : undefined;
  let detail = remoteErrorDetail(body);
  if (detail === undefined) {
    detail = error instanceof Error ? error.message : String(error);
    const urlIndex = detail.indexOf('for url');
    if (urlIndex >= 0) {
      detail = detail.slice(0, urlIndex).trim();
    }
  }
  if (detail.includes('is illegal')) {
    detail += LOCKED_FIELD_NOTE;
  }
  return detail;
}
