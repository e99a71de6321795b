/**
 * Concurrency and retry primitives shared by the remote client and the
 * update orchestrator.
 */

export function delay(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─────────────────────────────────────────────────────────────────────────────
// Concurrency gate
// ─────────────────────────────────────────────────────────────────────────────

export type ConcurrencyGate = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Semaphore as a higher-order function: at most `limit` wrapped calls run at
 * once, the rest wait in FIFO order.
 */
export function makeConcurrencyGate(limit: number): ConcurrencyGate {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }
  let active = 0;
  const waiting: Array<() => void> = [];

  const release = () => {
    active -= 1;
    const next = waiting.shift();
    if (next) {
      active += 1;
      next();
    }
  };

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    if (active < limit) {
      active += 1;
    } else {
      await new Promise<void>((resolve) => waiting.push(resolve));
    }
    try {
      return await fn();
    } finally {
      release();
    }
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Retry
// ─────────────────────────────────────────────────────────────────────────────

export interface BackoffOptions {
  /** Delay before the first retry; doubles on each further attempt. */
  baseDelayMs?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound of the uniform random jitter added to each wait. */
  jitterMs?: number;
  random?: () => number;
}

export interface RetryOptions extends BackoffOptions {
  maxRetries?: number;
  /** Defaults to retrying every error. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

/** Wait before retry number `attempt + 1` (attempt is zero-based). */
export function backoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const base = options.baseDelayMs ?? 500;
  const min = options.minDelayMs ?? 0;
  const max = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
  const exponential = Math.min(Math.max(base * 2 ** attempt, min), max);
  const jitter = (options.jitterMs ?? 0) * (options.random ?? Math.random)();
  return exponential + jitter;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const sleep = options.sleep ?? delay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error, attempt)) {
        throw error;
      }
      const waitMs = backoffDelay(attempt, options);
      await options.onRetry?.(error, attempt, waitMs);
      await sleep(waitMs);
    }
  }
}
