import { createHash } from 'crypto';

export type CacheLookup<T> = { hit: true; value: T } | { hit: false };

export type CacheOperation = 'land_price' | 'area_yield' | 'comparable_sales' | 'market_trends';

// Per-operation time to live, in hours
export const CACHE_TTL_HOURS: Record<CacheOperation, number> = {
  land_price: 24 * 30,
  area_yield: 24 * 7,
  comparable_sales: 24,
  market_trends: 24
};

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export type Clock = () => number;

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Market Data Cache - time-bounded key/value store for upstream lookups.
 * No size bound: the key space is the distinct queries of one process.
 * Writes overwrite whole entries, so concurrent requests never merge state.
 */
export class MarketDataCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly clock: Clock = Date.now) {}

  /**
   * Canonical key: operation name plus a digest of the sorted key:value pairs
   */
  static makeKey(operation: CacheOperation, params: Record<string, string | number>): string {
    const canonical = Object.keys(params)
      .sort()
      .map((k) => `${k}:${params[k]}`)
      .join('_');
    const digest = createHash('sha256').update(canonical).digest('hex').slice(0, 16);
    return `${operation}_${digest}`;
  }

  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);

    if (!entry || this.clock() >= entry.expiresAt) {
      this.misses++;
      return { hit: false };
    }

    this.hits++;
    return { hit: true, value: entry.value };
  }

  set(key: string, value: V, ttlHours: number): void {
    this.entries.set(key, {
      value,
      expiresAt: this.clock() + ttlHours * 60 * 60 * 1000
    });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }
}
