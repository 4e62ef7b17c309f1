export const DEFAULT_SERIES_CACHE_TTL_MS = 60 * 60_000;

type CacheEntry<T> = {
  value: T;
  createdAt: number;
};

export interface TtlCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

export interface TtlCacheStats {
  size: number;
  hits: number;
  misses: number;
}

/**
 * In-memory memoization of fetch results with one uniform time-to-live.
 *
 * Expiry is checked lazily on read; nothing sweeps the map in the background,
 * so the number of entries is bounded by the number of distinct keys callers
 * use. Concurrent misses on the same key are not coalesced: each caller runs
 * its own fetch and the last one to settle wins the slot.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SERIES_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the stored value for `key` while it is younger than the TTL,
   * otherwise awaits `fetchFn`, stores its result and returns it. A rejected
   * fetch is propagated and leaves the cache unchanged.
   */
  async getOrFetch(key: string, fetchFn: () => Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.createdAt < this.ttlMs) {
      this.hits += 1;
      return entry.value;
    }

    this.misses += 1;
    const value = await fetchFn();
    this.entries.set(key, { value, createdAt: this.now() });
    return value;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): TtlCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
