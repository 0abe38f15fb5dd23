/**
 * Analysis request boundary
 *
 * One call fetches (or reuses) a series, runs the engine and returns either a
 * response ready for presentation or a uniform NoResult. Nothing escapes as a
 * thrown error.
 */

import { normalizeSymbol } from '@signalcheck/contracts';
import type {
  AnalysisResponse,
  MarketDataSource,
  NoResult,
  Series,
  Timeframe,
} from '@signalcheck/contracts';
import { analyzeSeries, computeEMA, DEFAULT_EMA_WINDOW } from '@signalcheck/analysis-kit';
import type { AnalysisOptions } from '@signalcheck/analysis-kit';
import type { SeriesCache } from '@signalcheck/bars-cache';
import { startTimer, withRequestContext, type Logger } from '@signalcheck/logger';

export interface AnalysisServiceConfig {
  source: MarketDataSource;
  logger: Logger;
  cache?: SeriesCache;
  options?: AnalysisOptions;
}

export interface AnalyzeRequestOptions {
  signal?: AbortSignal;
  /** Skip the cache lookup; a successful fetch still refreshes the entry */
  bypassCache?: boolean;
}

type SeriesLookup =
  | { ok: true; series: Series; cache: 'hit' | 'miss' | 'off' }
  | { ok: false; noResult: NoResult };

export class AnalysisService {
  private readonly source: MarketDataSource;
  private readonly logger: Logger;
  private readonly cache?: SeriesCache;
  private readonly options: AnalysisOptions;

  constructor(config: AnalysisServiceConfig) {
    this.source = config.source;
    this.logger = config.logger.child({ component: 'analysis-service' });
    this.cache = config.cache;
    this.options = config.options ?? {};
  }

  /**
   * Analyze one symbol on one timeframe.
   *
   * @example
   * ```typescript
   * const response = await service.analyze('tcs.ns', Timeframe.D1);
   * if (!isNoResult(response)) {
   *   console.log(response.verdict, response.passingCount);
   * }
   * ```
   */
  async analyze(
    symbol: string,
    timeframe: Timeframe,
    requestOptions: AnalyzeRequestOptions = {}
  ): Promise<AnalysisResponse | NoResult> {
    const ticker = normalizeSymbol(symbol);

    return withRequestContext(
      async () => {
        const timer = startTimer();
        try {
          return await this.run(ticker, timeframe, requestOptions, () => timer.elapsed());
        } catch (error) {
          this.logger.error('Analysis failed unexpectedly', {
            symbol: ticker,
            timeframe,
            result: 'error',
            error_code: 'UNEXPECTED',
            duration_ms: timer.stop(),
            error,
          });
          return this.noResult(ticker, timeframe, 'UNEXPECTED', errorMessage(error));
        }
      },
      undefined,
      { symbol: ticker, timeframe }
    );
  }

  private async run(
    ticker: string,
    timeframe: Timeframe,
    requestOptions: AnalyzeRequestOptions,
    elapsed: () => number
  ): Promise<AnalysisResponse | NoResult> {
    const lookup = await this.loadSeries(ticker, timeframe, requestOptions);

    if (!lookup.ok) {
      this.logger.warn('No result', {
        symbol: ticker,
        timeframe,
        result: 'no-result',
        error_code: lookup.noResult.code,
        reason: lookup.noResult.reason,
        duration_ms: elapsed(),
      });
      return lookup.noResult;
    }

    const { series } = lookup;
    const outcome = analyzeSeries(series, this.options);

    if (!outcome.ok) {
      this.logger.warn('No result', {
        symbol: ticker,
        timeframe,
        result: 'no-result',
        error_code: outcome.error.code,
        reason: outcome.error.message,
        count: series.length,
        duration_ms: elapsed(),
      });
      return this.noResult(ticker, timeframe, outcome.error.code, outcome.error.message);
    }

    const { result } = outcome;
    const lastBar = series[series.length - 1];

    const response: AnalysisResponse = {
      ...result,
      symbol: ticker,
      timeframe,
      asOf: lastBar?.timestamp ?? '',
      series: series.map((bar) => ({ ...bar })),
      ema: computeEMA(series, this.options.emaWindow ?? DEFAULT_EMA_WINDOW),
    };

    this.logger.info('Analysis complete', {
      symbol: ticker,
      timeframe,
      result: 'success',
      verdict: result.verdict,
      count: result.passingCount,
      cache: lookup.cache === 'off' ? undefined : lookup.cache,
      duration_ms: elapsed(),
    });

    return response;
  }

  private async loadSeries(
    ticker: string,
    timeframe: Timeframe,
    requestOptions: AnalyzeRequestOptions
  ): Promise<SeriesLookup> {
    if (this.cache && !requestOptions.bypassCache) {
      const cached = this.cache.get(ticker, timeframe);
      if (cached) {
        this.logger.debug('Cache hit', { symbol: ticker, timeframe, count: cached.length });
        return { ok: true, series: cached, cache: 'hit' };
      }
    }

    const fetchTimer = startTimer();
    const fetched = await this.source.fetch(ticker, timeframe, { signal: requestOptions.signal });

    if (!fetched.ok) {
      return {
        ok: false,
        noResult: this.noResult(ticker, timeframe, fetched.error.code, fetched.error.message),
      };
    }

    this.logger.debug('Series fetched', {
      symbol: ticker,
      timeframe,
      provider: this.source.id,
      count: fetched.series.length,
      duration_ms: fetchTimer.stop(),
    });

    if (!this.cache) {
      return { ok: true, series: fetched.series, cache: 'off' };
    }

    this.cache.set(ticker, timeframe, fetched.series);
    return { ok: true, series: fetched.series, cache: 'miss' };
  }

  private noResult(symbol: string, timeframe: Timeframe, code: string, reason: string): NoResult {
    return { kind: 'no-result', symbol, timeframe, code, reason };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
