/**
 * In-memory cache whose entries expire a fixed time after they were stored.
 *
 * Expired entries are removed lazily, on the access that finds them stale.
 * When `maxEntries` is set the oldest insertion is evicted to make room.
 */

/** Five minutes */
export const DEFAULT_TTL_MS = 300_000;

export interface TtlCacheOptions {
  /** @default 300000 */
  ttlMs?: number;

  /** No limit when omitted */
  maxEntries?: number;

  /** Millisecond clock; tests inject a fake one */
  now?: () => number;
}

export interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface TtlCacheStats {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  expirations: number;
  size: number;
}

/**
 * @example
 * ```typescript
 * const cache = new TtlCache<PriceBar[]>({ ttlMs: 60_000, maxEntries: 500 });
 * cache.set('AAPL_6mo_1d', bars);
 * cache.get('AAPL_6mo_1d'); // bars, until a minute has passed
 * ```
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries?: number;
  private readonly now: () => number;
  private stats = { hits: 0, misses: 0, sets: 0, evictions: 0, expirations: 0 };

  constructor(options: TtlCacheOptions = {}) {
    const { ttlMs = DEFAULT_TTL_MS, maxEntries, now = Date.now } = options;

    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new Error(`ttlMs must be a positive number, got ${ttlMs}`);
    }
    if (maxEntries !== undefined && (!Number.isInteger(maxEntries) || maxEntries < 1)) {
      throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
    }

    this.ttlMs = ttlMs;
    this.maxEntries = maxEntries;
    this.now = now;
  }

  /**
   * Returns the cached value while it is fresh; a stale entry is deleted and
   * reported as a miss.
   */
  get(key: string): T | undefined {
    const entry = this.freshEntry(key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }
    this.stats.hits++;
    return entry.value;
  }

  has(key: string): boolean {
    return this.freshEntry(key) !== undefined;
  }

  set(key: string, value: T): void {
    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);

    if (this.maxEntries !== undefined) {
      while (this.entries.size >= this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
        this.stats.evictions++;
      }
    }

    this.entries.set(key, { value, storedAt: this.now() });
    this.stats.sets++;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): TtlCacheStats {
    return { ...this.stats, size: this.entries.size };
  }

  private freshEntry(key: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.stats.expirations++;
      return undefined;
    }

    return entry;
  }
}
