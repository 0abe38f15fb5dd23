/**
 * In-memory LRU cache for fetched series.
 *
 * Entries expire after a fixed TTL and are evicted least-recently-used first
 * once the cache is full. Uses a Map for O(1) lookups; Map insertion order is
 * the LRU order.
 */

import { normalizeSymbol } from '@signalcheck/contracts';
import type { Series, Timeframe } from '@signalcheck/contracts';
import type { Logger } from '@signalcheck/logger';
import type { CachedSeries, CacheKey, CacheStats, SeriesCacheOptions } from './types.js';

export const DEFAULT_TTL_MS = 5 * 60 * 1000;

export const DEFAULT_MAX_ENTRIES = 100;

/**
 * Format: {SYMBOL}:{timeframe}
 * Example: "TCS.NS:1d"
 */
export function serializeKey(key: CacheKey): string {
  return `${normalizeSymbol(key.symbol)}:${key.timeframe}`;
}

/**
 * Series cache with TTL and LRU eviction.
 *
 * - New entries are added to the end
 * - Accessed entries are moved to the end
 * - When full, the oldest (first) entry is evicted
 *
 * Stored series are frozen copies, so a caller mutating its own array cannot
 * change what later readers get.
 *
 * Example:
 * ```typescript
 * const cache = new SeriesCache({ ttlMs: 60_000 });
 * cache.set('TCS.NS', Timeframe.D1, series);
 * cache.get('tcs.ns', Timeframe.D1); // same bars
 * ```
 */
export class SeriesCache {
  private readonly entries = new Map<string, CachedSeries>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: SeriesCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
    this.logger = options.logger?.child({ component: 'bars-cache' });

    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
    if (!(this.ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${this.ttlMs}`);
    }
  }

  /**
   * Returns the live series for a key, or null when absent or expired.
   * An expired entry is removed on access.
   */
  get(symbol: string, timeframe: Timeframe): Series | null {
    const key = serializeKey({ symbol, timeframe });
    const entry = this.entries.get(key);

    if (entry === undefined) {
      this.misses++;
      return null;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      this.logger?.debug('Cache entry expired', { key });
      return null;
    }

    // Move to end (LRU: most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.series;
  }

  set(symbol: string, timeframe: Timeframe, series: Series): void {
    const key = serializeKey({ symbol, timeframe });

    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
        this.evictions++;
        this.logger?.debug('Cache entry evicted', { key: oldest });
      }
    }

    this.entries.set(key, {
      series: Object.freeze(series.map((bar) => Object.freeze({ ...bar }))),
      storedAt: this.now(),
    });
  }

  /**
   * @returns true when an entry was removed
   */
  invalidate(symbol: string, timeframe: Timeframe): boolean {
    return this.entries.delete(serializeKey({ symbol, timeframe }));
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Drops every expired entry.
   *
   * @returns Number of entries removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
    };
  }

  private isExpired(entry: CachedSeries): boolean {
    return this.now() - entry.storedAt >= this.ttlMs;
  }
}
