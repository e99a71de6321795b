/**
 * Tests for the HTTP client: headers, transport retries and error mapping.
 * fetch is stubbed; nothing leaves the process.
 */

import { describe, expect, it, vi } from 'vitest';
import { ProjectHttpClient } from '../../src/services/project/client.js';
import { RemoteHttpError, TransportError } from '../../src/shared/metadata/errors.js';
import { silentLogger } from '../mocks/logger.js';

type FetchArgs = Parameters<typeof fetch>;

function stubFetch(...replies: Array<() => Response>) {
  const queue = [...replies];
  return vi.fn(async (..._args: FetchArgs): Promise<Response> => {
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (!next) {
      throw new Error('no reply configured');
    }
    return next();
  });
}

const json = (body: unknown, init: ResponseInit = {}) => () =>
  new Response(JSON.stringify(body), { status: 200, ...init });

function makeClient(fetchImpl: typeof fetch) {
  return new ProjectHttpClient({
    baseUrl: 'https://project.example.test/',
    pluginToken: 'test-secret',
    userKey: 'user_test',
    minRetryDelayMs: 0,
    fetchImpl,
    logger: silentLogger,
  });
}

describe('ProjectHttpClient', () => {
  it('sends JSON with the auth headers', async () => {
    const fetchImpl = stubFetch(json({ err_code: 0, data: [] }));
    const response = await makeClient(fetchImpl).request('POST', '/open_api/projects', { a: 1 });

    expect(response).toEqual({ httpStatus: 200, json: { err_code: 0, data: [] } });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://project.example.test/open_api/projects');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"a":1}');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-PLUGIN-TOKEN': 'test-secret',
      'X-USER-KEY': 'user_test',
    });
  });

  it('sends no body with GET', async () => {
    const fetchImpl = stubFetch(json({ err_code: 0 }));
    await makeClient(fetchImpl).request('GET', '/open_api/project_alpha/work_item/all-types', { ignored: true });
    expect(fetchImpl.mock.calls[0]?.[1]?.body).toBeUndefined();
  });

  it('retries 5xx responses', async () => {
    const fetchImpl = stubFetch(json(null, { status: 502 }), json({ err_code: 0 }));
    const response = await makeClient(fetchImpl).request('POST', '/x', {});
    expect(response.httpStatus).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('raises RemoteHttpError when 5xx persists', async () => {
    const fetchImpl = stubFetch(json({ err_msg: 'down' }, { status: 503, statusText: 'Service Unavailable' }));
    const error = await makeClient(fetchImpl)
      .request('POST', '/x', {})
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteHttpError);
    expect(error).toMatchObject({
      status: 503,
      body: { err_msg: 'down' },
      message: 'HTTP 503 Service Unavailable for url /x',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('returns 4xx responses untouched', async () => {
    const fetchImpl = stubFetch(json({ err_msg: 'missing' }, { status: 404 }));
    const response = await makeClient(fetchImpl).request('POST', '/x', {});
    expect(response).toEqual({ httpStatus: 404, json: { err_msg: 'missing' } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('raises TransportError after repeated connection failures', async () => {
    const fetchImpl = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    const error = await makeClient(fetchImpl)
      .request('POST', '/x', {})
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Request to /x failed: fetch failed' });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('reads empty and non-JSON bodies', async () => {
    const fetchImpl = stubFetch(
      () => new Response('', { status: 200 }),
      () => new Response('<html>', { status: 200 }),
    );
    const client = makeClient(fetchImpl);
    expect((await client.request('POST', '/x', {})).json).toBeNull();
    expect((await client.request('POST', '/x', {})).json).toEqual({ raw: '<html>' });
  });
});
