/**
 * TTL-scoped buckets with one in-flight reload per bucket.
 *
 * A bucket is a snapshot replaced as a whole: readers see either the last
 * successful load or nothing. Concurrent readers of a missing or expired
 * bucket share the single pending reload. Buckets under different keys never
 * wait on each other.
 *
 * Expired buckets are swept whenever a bucket is written, and `maxBuckets`
 * evicts the oldest-written bucket once the store is full. A load that was
 * started before an invalidation of its key still answers its waiters but
 * does not write its result.
 */

export interface CacheBucket<T> {
  readonly values: T;
  readonly loadedAt: number;
}

export interface BucketStoreOptions {
  /** Label used in logs and stats */
  name: string;
  ttlMs: number;
  /** Upper bound on stored buckets; unbounded when omitted */
  maxBuckets?: number;
  now?: () => number;
}

export interface BucketStoreStats {
  name: string;
  buckets: number;
  loads: number;
  inFlight: number;
}

export class BucketStore<T> {
  private readonly buckets = new Map<string, CacheBucket<T>>();
  private readonly inFlight = new Map<string, Promise<CacheBucket<T>>>();
  private readonly now: () => number;
  private loads = 0;

  constructor(private readonly options: BucketStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get name(): string {
    return this.options.name;
  }

  isExpired(bucket: CacheBucket<T>): boolean {
    return this.now() - bucket.loadedAt >= this.options.ttlMs;
  }

  /** Values of a fresh bucket, without loading. */
  peek(key: string): T | undefined {
    const bucket = this.buckets.get(key);
    if (bucket && !this.isExpired(bucket)) {
      return bucket.values;
    }
    return undefined;
  }

  /** Every fresh bucket, for read-only scans across keys. */
  *fresh(): IterableIterator<[string, T]> {
    for (const [key, bucket] of this.buckets) {
      if (!this.isExpired(bucket)) {
        yield [key, bucket.values];
      }
    }
  }

  /**
   * Fresh values for `key`, loading them at most once however many callers
   * arrive while the bucket is missing or expired. A failed load leaves the
   * previous bucket in place (still expired) and rejects every waiter.
   */
  async get(key: string, load: () => Promise<T>): Promise<T> {
    const fresh = this.peek(key);
    if (fresh !== undefined) {
      return fresh;
    }
    return this.refresh(key, load);
  }

  /**
   * Reload `key` even when its bucket is still fresh. Joins a load already in
   * flight for the key instead of starting a second one.
   */
  async refresh(key: string, load: () => Promise<T>): Promise<T> {
    const pending = this.inFlight.get(key);
    if (pending) {
      return (await pending).values;
    }

    const reload: Promise<CacheBucket<T>> = (async () => {
      try {
        const values = await Promise.resolve().then(load);
        const bucket: CacheBucket<T> = { values, loadedAt: this.now() };
        this.loads += 1;
        // An invalidation during the load detaches it from the key.
        if (this.inFlight.get(key) === reload) {
          this.store(key, bucket);
        }
        return bucket;
      } finally {
        if (this.inFlight.get(key) === reload) {
          this.inFlight.delete(key);
        }
      }
    })();

    this.inFlight.set(key, reload);
    return (await reload).values;
  }

  /** Swap in values obtained elsewhere (e.g. a batched query). */
  prime(key: string, values: T): void {
    this.store(key, { values, loadedAt: this.now() });
  }

  invalidate(key: string): void {
    this.buckets.delete(key);
    this.inFlight.delete(key);
  }

  /** Drop buckets whose key matches the predicate. */
  invalidateWhere(predicate: (key: string) => boolean): void {
    const keys = new Set([...this.buckets.keys(), ...this.inFlight.keys()]);
    for (const key of keys) {
      if (predicate(key)) {
        this.invalidate(key);
      }
    }
  }

  clear(): void {
    this.buckets.clear();
    this.inFlight.clear();
  }

  stats(): BucketStoreStats {
    return {
      name: this.options.name,
      buckets: this.buckets.size,
      loads: this.loads,
      inFlight: this.inFlight.size,
    };
  }

  private store(key: string, bucket: CacheBucket<T>): void {
    for (const [storedKey, stored] of this.buckets) {
      if (this.isExpired(stored)) {
        this.buckets.delete(storedKey);
      }
    }
    // Re-inserting moves the key to the end of the eviction order.
    this.buckets.delete(key);

    const max = this.options.maxBuckets;
    if (max !== undefined && max > 0) {
      for (const oldest of this.buckets.keys()) {
        if (this.buckets.size < max) {
          break;
        }
        this.buckets.delete(oldest);
      }
    }
    this.buckets.set(key, bucket);
  }
}
