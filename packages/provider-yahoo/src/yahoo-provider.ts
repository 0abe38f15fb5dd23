/**
 * @fileoverview Yahoo Finance data provider implementation.
 *
 * Fetches OHLCV history from the public v8 chart endpoint and turns it into a
 * clean series. Every failure is returned as a `DataUnavailableError` value.
 *
 * @module @signalcheck/provider-yahoo
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import moment from 'moment-timezone';
import type {
  Bar,
  DataUnavailableCause,
  FetchOptions,
  FetchOutcome,
  MarketDataSource,
} from '@signalcheck/contracts';
import { DataUnavailableError, Timeframe, getTimeframeProfile, normalizeSymbol } from '@signalcheck/contracts';
import type { Logger } from '@signalcheck/logger';
import { startTimer } from '@signalcheck/logger';
import { cleanBars, parseChartPayload } from './parser.js';
import { aggregateToSessionBuckets, filterToSession, validateSession } from './session.js';
import {
  DEFAULT_EXCHANGE_SESSION,
  DEFAULT_TIMEOUT_MS,
  YAHOO_CHART_BASE_URL,
} from './types.js';
import type { ExchangeSession, YahooProviderOptions } from './types.js';

/**
 * Chart API interval requested for each timeframe. 4h has no native interval
 * and is built from hourly bars.
 */
const YAHOO_INTERVALS: Record<Timeframe, string> = {
  [Timeframe.M5]: '5m',
  [Timeframe.M15]: '15m',
  [Timeframe.H1]: '60m',
  [Timeframe.H4]: '60m',
  [Timeframe.D1]: '1d',
  [Timeframe.W1]: '1wk',
  [Timeframe.MN1]: '1mo',
};

/**
 * Yahoo Finance data provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ timeoutMs: 5000 });
 * const outcome = await provider.fetch('TCS.NS', Timeframe.D1);
 * if (outcome.ok) {
 *   console.log(outcome.series.length);
 * }
 * ```
 */
export class YahooProvider implements MarketDataSource {
  readonly id = 'yahoo';

  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly session: ExchangeSession;
  private readonly now: () => Date;
  private readonly logger?: Logger;

  /**
   * @throws {ConfigurationError} If the exchange session is invalid
   */
  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ?? axios.create({ baseURL: options.baseUrl ?? YAHOO_CHART_BASE_URL });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.session = options.session ?? DEFAULT_EXCHANGE_SESSION;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger?.child({ component: 'provider-yahoo' });

    validateSession(this.session);
  }

  /**
   * Fetches and cleans the series for one symbol and timeframe.
   *
   * Makes exactly one request, bounded by `timeoutMs` and cancellable through
   * `options.signal`. Never rejects.
   */
  async fetch(symbol: string, timeframe: Timeframe, options: FetchOptions = {}): Promise<FetchOutcome> {
    const ticker = normalizeSymbol(symbol);
    const timer = startTimer();
    const fail = (cause: DataUnavailableCause, message: string): FetchOutcome => {
      const error = new DataUnavailableError(message, {
        symbol: ticker,
        timeframe,
        provider: this.id,
        cause,
      });
      this.logger?.warn('Fetch failed', {
        symbol: ticker,
        timeframe,
        operation: 'fetch',
        result: 'error',
        error_code: error.code,
        cause,
        reason: message,
        duration_ms: timer.stop(),
      });
      return { ok: false, error };
    };

    if (ticker.length === 0) {
      return fail('provider', 'Symbol must be a non-empty string');
    }

    const { lookback, intraday } = getTimeframeProfile(timeframe);
    const end = moment.utc(this.now());
    const start = end.clone().subtract(lookback.amount, lookback.unit);

    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(`/${encodeURIComponent(ticker)}`, {
        params: {
          interval: YAHOO_INTERVALS[timeframe],
          period1: Math.floor(start.valueOf() / 1000),
          period2: Math.floor(end.valueOf() / 1000),
          includePrePost: false,
          events: 'div,splits',
        },
        timeout: this.timeoutMs,
        signal: options.signal,
      });
      payload = response.data;
    } catch (error) {
      const { cause, message } = this.describeRequestError(error);
      return fail(cause, message);
    }

    const parsed = parseChartPayload(payload);
    if (!parsed.ok) {
      return fail(parsed.cause, parsed.reason);
    }

    let series: Bar[] = cleanBars(parsed.rows);
    if (intraday) {
      series = filterToSession(series, this.session);
    }
    if (timeframe === Timeframe.H4) {
      series = aggregateToSessionBuckets(series, this.session);
    }

    if (series.length === 0) {
      return fail('empty', `No bars returned for ${ticker} (${timeframe})`);
    }

    this.logger?.debug('Fetch finished', {
      symbol: ticker,
      timeframe,
      operation: 'fetch',
      result: 'success',
      count: series.length,
      duration_ms: timer.stop(),
    });

    return { ok: true, series };
  }

  private describeRequestError(error: unknown): { cause: DataUnavailableCause; message: string } {
    if (axios.isCancel(error)) {
      return { cause: 'aborted', message: 'Request was cancelled' };
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return { cause: 'timeout', message: `Request timed out after ${this.timeoutMs}ms` };
      }

      if (error.response) {
        // Yahoo reports unknown symbols as a 404 carrying a chart error
        const parsed = parseChartPayload(error.response.data);
        const detail = parsed.ok ? error.message : parsed.reason;
        return {
          cause: 'provider',
          message: `Yahoo Finance responded with HTTP ${error.response.status}: ${detail}`,
        };
      }

      return { cause: 'transport', message: error.message };
    }

    return {
      cause: 'transport',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
