// src/cache.ts

/**
 * Minimal key-value cache with per-key expiry. Implement this over Redis,
 * memcached or anything else that can expire keys.
 */
export interface CacheStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T, ttlMs: number): void;
  delete(key: string): void;
}

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

/**
 * In-process TTL cache. Expired entries are dropped on read; when maxEntries
 * is reached the oldest-written entry is evicted.
 */
export class MemoryCache<T> implements CacheStore<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(opts: { maxEntries?: number; now?: () => number } = {}) {
    const maxEntries = opts.maxEntries ?? 10_000;
    if (!Number.isFinite(maxEntries) || maxEntries <= 0) {
      throw new Error(`maxEntries must be > 0 (got ${maxEntries})`);
    }
    this.maxEntries = maxEntries;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): T | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) throw new Error(`ttlMs must be > 0 (got ${ttlMs})`);

    // Re-insert so Map order tracks write order
    this.store.delete(key);
    this.store.set(key, { value, expiresAt: this.now() + ttlMs });

    while (this.store.size > this.maxEntries) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  get size(): number {
    return this.store.size;
  }
}
