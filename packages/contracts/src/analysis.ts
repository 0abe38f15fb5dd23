/**
 * @fileoverview Analysis result types and the data source contract.
 *
 * These are pure data structures handed between the data source, the engine
 * and the presentation layer. Nothing here holds a reference to a mutable series.
 *
 * @module @signalcheck/contracts/analysis
 */

import type { AnalysisError, DataUnavailableError } from './errors.js';
import type { Bar, Series } from './market.js';
import type { Timeframe } from './timeframes.js';

/**
 * Checklist signals, in display order.
 */
export const SIGNAL_NAMES = [
  'uptrend',
  'hhHl',
  'nearResistance',
  'volumeSpike',
  'clearLevels',
  'goodRR',
] as const;

export type SignalName = (typeof SIGNAL_NAMES)[number];

export type SignalMap = Readonly<Record<SignalName, boolean>>;

export const SIGNAL_LABELS: Readonly<Record<SignalName, string>> = {
  uptrend: 'In uptrend',
  hhHl: 'HH/HL pattern',
  nearResistance: 'Near resistance',
  volumeSpike: 'Volume spike',
  clearLevels: 'Clear levels',
  goodRR: 'Good R/R ratio',
};

/**
 * Verdict derived from the number of passing signals.
 * - strong: 5 or more
 * - neutral: 3 or 4
 * - avoid: fewer than 3
 */
export type Verdict = 'strong' | 'neutral' | 'avoid';

export interface IndicatorSet {
  /** EMA aligned 1:1 with the series */
  ema: number[];
  /** Latest ATR value */
  atr: number;
}

/**
 * Recent swing levels, each side ascending by price.
 */
export interface LevelSet {
  readonly support: readonly number[];
  readonly resistance: readonly number[];
}

export interface ChecklistEntry {
  name: SignalName;
  label: string;
  passed: boolean;
}

/**
 * Output of one engine run.
 *
 * @invariant passingCount === number of true values in signals
 */
export interface AnalysisResult {
  signals: SignalMap;
  passingCount: number;
  verdict: Verdict;
  stopLoss: number;
  target: number;
  rrRatio: number;
  atr: number;
  levels: LevelSet;
  lastClose: number;
  emaLast: number;
}

export type AnalysisOutcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: AnalysisError };

/**
 * What the request boundary hands to the presentation layer on success:
 * the result plus copies of the bars and EMA needed for charting.
 */
export interface AnalysisResponse extends AnalysisResult {
  symbol: string;
  timeframe: Timeframe;
  /** ISO 8601 timestamp of the latest bar */
  asOf: string;
  series: Bar[];
  ema: number[];
}

/**
 * Uniform failure outcome. Presentation code renders it without inspecting
 * the cause; `code` and `reason` exist for logging.
 */
export interface NoResult {
  kind: 'no-result';
  symbol: string;
  timeframe: Timeframe;
  code: string;
  reason: string;
}

export function isNoResult(value: AnalysisResponse | NoResult): value is NoResult {
  return 'kind' in value && value.kind === 'no-result';
}

export type FetchOutcome =
  | { ok: true; series: Series }
  | { ok: false; error: DataUnavailableError };

export interface FetchOptions {
  /** Cancels the in-flight request */
  signal?: AbortSignal;
}

/**
 * Retrieves and cleans a bar series. Implementations never throw; every
 * failure comes back as `{ ok: false }`.
 */
export interface MarketDataSource {
  readonly id: string;
  fetch(symbol: string, timeframe: Timeframe, options?: FetchOptions): Promise<FetchOutcome>;
}
