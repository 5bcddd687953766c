/**
 * Time-bounded cache owned by the application root and injected where needed.
 *
 * Entries are replaced whole; concurrent misses on one key share a single
 * in-flight fetch. A rejected fetch stores nothing, so the next call retries.
 */

export interface CacheEntry<T> {
  value: T;
  fetchedAt: number;
}

export interface TtlCacheOptions {
  now?: () => number;
}

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inflight = new Map<string, Promise<T>>();
  private readonly now: () => number;

  constructor(options: TtlCacheOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async getOrRefresh(
    key: string,
    ttlMs: number,
    fetchFn: () => Promise<T>
  ): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.fetchedAt < ttlMs) {
      return entry.value;
    }

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const run = (async () => {
      try {
        const value = await fetchFn();
        this.entries.set(key, { value, fetchedAt: this.now() });
        return value;
      } finally {
        this.inflight.delete(key);
      }
    })();
    this.inflight.set(key, run);
    return run;
  }

  peek(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(key);
  }
}
