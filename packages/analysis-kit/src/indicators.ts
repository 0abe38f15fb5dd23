/**
 * Indicator engine - exponential moving average and average true range
 * Pure functions over a validated series
 */

import { ComputationError } from '@signalcheck/contracts';
import type { IndicatorSet, Series } from '@signalcheck/contracts';
import type { IndicatorOptions } from './types.js';
import { assertPositiveInteger } from './validation.js';

export const DEFAULT_EMA_WINDOW = 50;

export const DEFAULT_ATR_WINDOW = 14;

function toCloses(input: Series | readonly number[]): number[] {
  const closes: number[] = [];
  for (const item of input) {
    closes.push(typeof item === 'number' ? item : item.close);
  }
  return closes;
}

/**
 * Exponential moving average of closing prices
 *
 * Smoothing factor α = 2 / (window + 1). The first value seeds the average,
 * so the output has the same length as the input.
 *
 * @param input - Series or raw closing prices
 * @param window - EMA span
 * @returns EMA aligned 1:1 with the input
 */
export function computeEMA(input: Series | readonly number[], window: number = DEFAULT_EMA_WINDOW): number[] {
  assertPositiveInteger('emaWindow', window);

  const closes = toCloses(input);
  const alpha = 2 / (window + 1);
  const ema: number[] = [];

  for (let i = 0; i < closes.length; i++) {
    const close = closes[i] ?? Number.NaN;
    const previous = ema[i - 1];
    ema.push(previous === undefined ? close : alpha * close + (1 - alpha) * previous);
  }

  return ema;
}

/**
 * True range of every bar. The first bar has no previous close, so its range
 * is simply high - low.
 */
export function computeTrueRange(series: Series): number[] {
  return series.map((bar, i) => {
    const range = bar.high - bar.low;
    const previous = series[i - 1];
    if (!previous) {
      return range;
    }
    return Math.max(
      range,
      Math.abs(bar.high - previous.close),
      Math.abs(bar.low - previous.close)
    );
  });
}

/**
 * Latest average true range: the simple mean of the last `window` true ranges
 *
 * @throws ComputationError if the series is shorter than the window
 */
export function computeATR(series: Series, window: number = DEFAULT_ATR_WINDOW): number {
  assertPositiveInteger('atrWindow', window);

  if (series.length < window) {
    throw new ComputationError(`ATR(${window}) needs ${window} bars, got ${series.length}`, {
      stage: 'indicators',
      required: window,
      received: series.length,
    });
  }

  const ranges = computeTrueRange(series).slice(-window);
  const atr = ranges.reduce((sum, value) => sum + value, 0) / window;

  if (!Number.isFinite(atr)) {
    throw new ComputationError(`ATR is not finite: ${atr}`, { stage: 'indicators' });
  }

  return atr;
}

/**
 * EMA and ATR in one call
 */
export function computeIndicators(series: Series, options: IndicatorOptions = {}): IndicatorSet {
  return {
    ema: computeEMA(series, options.emaWindow ?? DEFAULT_EMA_WINDOW),
    atr: computeATR(series, options.atrWindow ?? DEFAULT_ATR_WINDOW),
  };
}
