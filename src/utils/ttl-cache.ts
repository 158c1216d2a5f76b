import { log } from "./logger.js";

export type CacheEntry<T> = {
  value: T;
  storedAt: number;
  expiresAt: number;
  hits: number;
};

export type CacheStats = { size: number; hits: number; misses: number; evictions: number; hitRate: number };

export type TtlCacheOptions = {
  /** Time-to-live in milliseconds (default: 15 seconds) */
  ttlMs?: number;
  /** Maximum number of entries (default: 1000) */
  maxEntries?: number;
  /** Clock override, used by tests. */
  now?: () => number;
};

/**
 * In-memory LRU map whose entries expire a fixed time after they were stored.
 * Reads never extend an entry's lifetime.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private ttlMs: number;
  private maxEntries: number;
  private now: () => number;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(opts: TtlCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 15_000;
    this.maxEntries = opts.maxEntries ?? 1000;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Get a value from cache. Returns undefined if not found or expired.
   */
  get(key: string): T | undefined {
    return this.entry(key)?.value;
  }

  /** Like get(), but returns the entry with its timestamps. */
  entry(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.stats.misses++;
      log.debug("Cache entry expired", { key });
      return undefined;
    }

    this.stats.hits++;
    entry.hits++;

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  set(key: string, value: T, ttlMs = this.ttlMs): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) break;
      this.entries.delete(oldestKey);
      this.stats.evictions++;
      log.debug("Cache eviction (LRU)", { key: oldestKey });
    }

    const storedAt = this.now();
    this.entries.set(key, { value, storedAt, expiresAt: storedAt + ttlMs, hits: 0 });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.entries.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }
}
