/**
 * @fileoverview Market data types shared by the data source and the engine.
 *
 * @module @signalcheck/contracts/market
 */

/**
 * A single OHLCV bar.
 *
 * @invariant timestamp is valid ISO 8601 string (UTC, bar open)
 * @invariant volume >= 0
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   timestamp: '2025-01-15T03:45:00.000Z',
 *   open: 3950.5,
 *   high: 3962.0,
 *   low: 3941.25,
 *   close: 3958.75,
 *   volume: 182000
 * };
 * ```
 */
export interface Bar {
  readonly timestamp: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Ordered bars for one symbol/timeframe pair.
 *
 * @invariant timestamps strictly increasing, no duplicates
 */
export type Series = readonly Bar[];

/**
 * Minimum number of bars required before any derived computation runs.
 */
export const MIN_SERIES_LENGTH = 20;

/**
 * Trims and upper-cases a ticker: `' tcs.ns '` becomes `'TCS.NS'`.
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
