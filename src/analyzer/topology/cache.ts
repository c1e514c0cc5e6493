export type Clock = () => number;

type CacheEntry<T> = {
  value: T;
  storedAt: number;
};

export type CacheLookup<T> = { found: true; value: T } | { found: false };

/**
 * TTL store. Entries go stale on read; nothing is evicted in the background.
 * All map operations are synchronous, so a set is never observed half-done.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private inflight = new Map<string, Promise<T>>();

  constructor(
    private ttlMs: number,
    private now: Clock = Date.now
  ) {}

  get(key: string): CacheLookup<T> {
    const entry = this.entries.get(key);
    if (!entry) return { found: false };
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return { found: false };
    }
    return { found: true, value: entry.value };
  }

  set(key: string, value: T) {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  invalidate(key: string) {
    this.entries.delete(key);
    this.inflight.delete(key);
  }

  clear() {
    this.entries.clear();
    this.inflight.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached value, or runs loader once for all concurrent callers
   * of the same key. A rejected load is not stored.
   */
  getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const hit = this.get(key);
    if (hit.found) return Promise.resolve(hit.value);

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const p: Promise<T> = loader().then(
      (value) => {
        if (this.inflight.get(key) === p) {
          this.inflight.delete(key);
          this.set(key, value);
        }
        return value;
      },
      (err: unknown) => {
        if (this.inflight.get(key) === p) this.inflight.delete(key);
        throw err;
      }
    );
    this.inflight.set(key, p);
    return p;
  }
}

/** Per-kind caches sharing one TTL and clock. */
export class CacheRegistry {
  private caches: Array<TtlCache<unknown>> = [];

  constructor(
    readonly ttlMs: number,
    private now: Clock = Date.now
  ) {}

  create<T>(): TtlCache<T> {
    const cache = new TtlCache<T>(this.ttlMs, this.now);
    this.caches.push(cache);
    return cache;
  }

  clear() {
    for (const c of this.caches) c.clear();
  }
}
