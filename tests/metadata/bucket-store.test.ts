import { describe, expect, it, vi } from 'vitest';
import { BucketStore } from '../../src/shared/metadata/bucket-store.js';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: unknown) => void } {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('BucketStore', () => {
  it('shares one load between concurrent readers of a missing bucket', async () => {
    const store = new BucketStore<string>({ name: 'test', ttlMs: 1000 });
    const gate = deferred<string>();
    const load = vi.fn(() => gate.promise);

    const readers = Array.from({ length: 5 }, () => store.get('a', load));
    expect(store.stats().inFlight).toBe(1);
    gate.resolve('value');

    await expect(Promise.all(readers)).resolves.toEqual(['value', 'value', 'value', 'value', 'value']);
    expect(load).toHaveBeenCalledTimes(1);
    expect(store.stats()).toEqual({ name: 'test', buckets: 1, loads: 1, inFlight: 0 });
  });

  it('does not make other keys wait on a pending load', async () => {
    const store = new BucketStore<string>({ name: 'test', ttlMs: 1000 });
    const gate = deferred<string>();
    const slow = store.get('slow', () => gate.promise);

    await expect(store.get('fast', async () => 'quick')).resolves.toBe('quick');

    gate.resolve('late');
    await expect(slow).resolves.toBe('late');
  });

  it('reloads exactly once after the TTL elapses', async () => {
    let clock = 0;
    const store = new BucketStore<number>({ name: 'ttl', ttlMs: 1000, now: () => clock });
    let version = 0;
    const load = vi.fn(async () => ++version);

    expect(await store.get('k', load)).toBe(1);
    clock = 999;
    expect(await store.get('k', load)).toBe(1);
    clock = 1000;
    const [a, b] = await Promise.all([store.get('k', load), store.get('k', load)]);
    expect([a, b]).toEqual([2, 2]);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('rejects every waiter on a failed load and retries on the next read', async () => {
    const store = new BucketStore<string>({ name: 'fail', ttlMs: 1000 });
    const failing = vi.fn(async (): Promise<string> => {
      throw new Error('boom');
    });

    const results = await Promise.allSettled([store.get('k', failing), store.get('k', failing)]);
    expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected']);
    expect(failing).toHaveBeenCalledTimes(1);
    expect(store.stats().inFlight).toBe(0);

    await expect(store.get('k', async () => 'recovered')).resolves.toBe('recovered');
  });

  it('turns a synchronous throw in the loader into a rejection', async () => {
    const store = new BucketStore<string>({ name: 'sync', ttlMs: 1000 });
    await expect(
      store.get('k', () => {
        throw new Error('sync boom');
      }),
    ).rejects.toThrow('sync boom');
  });

  it('supports priming, peeking and invalidation', () => {
    let clock = 0;
    const store = new BucketStore<string>({ name: 'manual', ttlMs: 10, now: () => clock });
    store.prime('ws::a', 'A');
    store.prime('ws::b', 'B');
    store.prime('other::c', 'C');

    expect(store.peek('ws::a')).toBe('A');
    expect([...store.fresh()].map(([key]) => key)).toEqual(['ws::a', 'ws::b', 'other::c']);

    store.invalidate('ws::a');
    expect(store.peek('ws::a')).toBeUndefined();

    store.invalidateWhere((key) => key.startsWith('ws::'));
    expect(store.stats().buckets).toBe(1);

    clock = 10;
    expect(store.peek('other::c')).toBeUndefined();
    expect([...store.fresh()]).toEqual([]);

    store.clear();
    expect(store.stats().buckets).toBe(0);
  });

  it('refresh reloads a fresh bucket and joins a pending reload', async () => {
    const store = new BucketStore<number>({ name: 'refresh', ttlMs: 1000 });
    let version = 0;
    const load = vi.fn(async () => ++version);

    expect(await store.get('k', load)).toBe(1);
    expect(await Promise.all([store.refresh('k', load), store.refresh('k', load)])).toEqual([2, 2]);
    expect(await store.get('k', load)).toBe(2);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('does not store a load invalidated while in flight', async () => {
    const store = new BucketStore<string>({ name: 'stale', ttlMs: 1000 });
    const gate = deferred<string>();
    const stale = store.get('k', () => gate.promise);

    store.invalidate('k');
    expect(store.stats().inFlight).toBe(0);
    gate.resolve('old');

    await expect(stale).resolves.toBe('old');
    expect(store.peek('k')).toBeUndefined();
    await expect(store.get('k', async () => 'new')).resolves.toBe('new');
  });

  it('keeps the newer load when an older one finishes after a clear', async () => {
    const store = new BucketStore<string>({ name: 'stale', ttlMs: 1000 });
    const first = deferred<string>();
    const second = deferred<string>();
    const stale = store.get('k', () => first.promise);
    store.clear();
    const current = store.get('k', () => second.promise);

    first.resolve('old');
    await stale;
    expect(store.peek('k')).toBeUndefined();
    expect(store.stats().inFlight).toBe(1);

    second.resolve('new');
    await current;
    expect(store.peek('k')).toBe('new');
  });

  it('sweeps expired buckets when writing', () => {
    let clock = 0;
    const store = new BucketStore<string>({ name: 'sweep', ttlMs: 10, now: () => clock });
    store.prime('a', 'A');
    clock = 5;
    store.prime('b', 'B');
    clock = 10;
    store.prime('c', 'C');

    expect(store.stats().buckets).toBe(2);
    expect([...store.fresh()].map(([key]) => key)).toEqual(['b', 'c']);
  });

  it('evicts the oldest-written bucket past maxBuckets', () => {
    const store = new BucketStore<string>({ name: 'capped', ttlMs: 1000, maxBuckets: 2 });
    store.prime('a', 'A');
    store.prime('b', 'B');
    store.prime('a', 'A2');
    store.prime('c', 'C');

    expect([...store.fresh()]).toEqual([
      ['a', 'A2'],
      ['c', 'C'],
    ]);
  });
});
