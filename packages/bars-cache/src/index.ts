/**
 * @signalcheck/bars-cache
 *
 * In-memory TTL and LRU cache for fetched bar series.
 */

export { SeriesCache, serializeKey, DEFAULT_TTL_MS, DEFAULT_MAX_ENTRIES } from './cacheStore.js';

export type { CachedSeries, CacheKey, CacheStats, SeriesCacheOptions } from './types.js';
