/**
 * @fileoverview Public API for @signalcheck/provider-yahoo package.
 *
 * @module @signalcheck/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@signalcheck/provider-yahoo';
 * import { Timeframe } from '@signalcheck/contracts';
 *
 * const provider = new YahooProvider();
 * const outcome = await provider.fetch('INFY.NS', Timeframe.H4);
 * ```
 */

export { YahooProvider } from './yahoo-provider.js';

export { parseChartPayload, cleanBars } from './parser.js';
export type { ChartParseResult } from './parser.js';

export {
  filterToSession,
  aggregateToSessionBuckets,
  parseClockTime,
  validateSession,
} from './session.js';

export {
  chartResponseSchema,
  DEFAULT_EXCHANGE_SESSION,
  DEFAULT_TIMEOUT_MS,
  YAHOO_CHART_BASE_URL,
} from './types.js';
export type {
  ExchangeSession,
  YahooProviderOptions,
  YahooChartResponse,
  YahooRawRow,
} from './types.js';
