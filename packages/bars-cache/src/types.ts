/**
 * Type definitions for the series cache.
 */

import type { Series, Timeframe } from '@signalcheck/contracts';
import type { Logger } from '@signalcheck/logger';

/**
 * A cleaned series with the time it entered the cache.
 */
export interface CachedSeries {
  series: Series;

  /** Unix time in milliseconds from the cache clock */
  storedAt: number;
}

/**
 * Identifies one cached series. The symbol is normalized before it becomes
 * part of the key, so 'tcs.ns' and 'TCS.NS' share an entry.
 */
export interface CacheKey {
  symbol: string;
  timeframe: Timeframe;
}

export interface SeriesCacheOptions {
  /**
   * Entry lifetime in milliseconds.
   * @default 300000 (5 minutes)
   */
  ttlMs?: number;

  /**
   * Entry count past which the least recently used entry is evicted.
   * @default 100
   */
  maxEntries?: number;

  /** Millisecond clock, `Date.now` unless a test supplies one */
  now?: () => number;

  logger?: Logger;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  /** Entries currently held, expired ones included until pruned */
  size: number;
}
