/**
 * HTTP client for the work-tracking open API.
 *
 * Injects the plugin token and user key headers, applies a fixed per-request
 * timeout and retries transport failures and 5xx responses. Status codes below
 * 500 are returned untouched; accessors decide what an error is.
 */

import { RemoteHttpError, TransportError } from '../../shared/metadata/errors.js';
import { withRetry } from '../../utils/limits.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RemoteResponse {
  httpStatus: number;
  json: unknown;
}

/**
 * Boundary used by every accessor. Tests substitute an in-process fake.
 */
export interface RemoteClient {
  request(method: HttpMethod, path: string, body?: unknown): Promise<RemoteResponse>;
}

export interface ProjectHttpClientOptions {
  baseUrl: string;
  pluginToken?: string;
  userKey?: string;
  timeoutMs?: number;
  /** Total attempts including the first one */
  maxAttempts?: number;
  minRetryDelayMs?: number;
  maxRetryDelayMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

class RetryableStatusError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly body: unknown,
  ) {
    super(`HTTP ${status} ${statusText}`);
    this.name = 'RetryableStatusError';
  }
}

class TransportFailure extends Error {
  constructor(readonly original: unknown) {
    super(original instanceof Error ? original.message : String(original));
    this.name = 'TransportFailure';
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text.slice(0, 200) };
  }
}

export class ProjectHttpClient implements RemoteClient {
  private readonly baseUrl: string;
  private readonly pluginToken?: string;
  private readonly userKey?: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly minRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(options: ProjectHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pluginToken = options.pluginToken;
    this.userKey = options.userKey;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.minRetryDelayMs = options.minRetryDelayMs ?? 1_000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger ?? rootLogger;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.pluginToken) {
      headers['X-PLUGIN-TOKEN'] = this.pluginToken;
    }
    if (this.userKey) {
      headers['X-USER-KEY'] = this.userKey;
    }
    return headers;
  }

  private async attempt(method: HttpMethod, path: string, body: unknown): Promise<RemoteResponse> {
    let response: Response;
    let json: unknown;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(),
        body: body === undefined || method === 'GET' ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      json = await readJson(response);
    } catch (error) {
      throw new TransportFailure(error);
    }

    if (response.status >= 500) {
      throw new RetryableStatusError(response.status, response.statusText, json);
    }
    if (response.status >= 400) {
      await this.log.error('http_request', { method, path, status: response.status });
    } else {
      await this.log.debug('http_request', { method, path, status: response.status });
    }
    return { httpStatus: response.status, json };
  }

  async request(method: HttpMethod, path: string, body?: unknown): Promise<RemoteResponse> {
    try {
      return await withRetry(() => this.attempt(method, path, body), {
        maxRetries: this.maxAttempts - 1,
        baseDelayMs: this.minRetryDelayMs,
        minDelayMs: this.minRetryDelayMs,
        maxDelayMs: this.maxRetryDelayMs,
        shouldRetry: (error) =>
          error instanceof RetryableStatusError || error instanceof TransportFailure,
        onRetry: (error, attempt, waitMs) =>
          this.log.warning('http_retry', {
            method,
            path,
            attempt: attempt + 1,
            waitMs,
            reason: error instanceof Error ? error.message : String(error),
          }),
      });
    } catch (error) {
      if (error instanceof RetryableStatusError) {
        throw new RemoteHttpError({
          status: error.status,
          statusText: error.statusText,
          path,
          body: error.body,
        });
      }
      if (error instanceof TransportFailure) {
        throw new TransportError({ path, cause: error.original });
      }
      throw error;
    }
  }
}
