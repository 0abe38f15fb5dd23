/**
 * Pattern evaluation - trend, higher highs/lows, resistance proximity and volume
 */

import type { Bar, LevelSet, Series, SignalName } from '@signalcheck/contracts';
import type { PatternOptions } from './types.js';
import { assertNonNegative, assertPositiveInteger } from './validation.js';

export const DEFAULT_PATTERN_OPTIONS: Required<PatternOptions> = {
  proximity: 0.02,
  volumeWindow: 10,
  volumeMultiplier: 1.5,
};

/** Signals decided by price action alone; goodRR comes from the risk stage */
export type PatternSignals = Readonly<Record<Exclude<SignalName, 'goodRR'>, boolean>>;

export interface PatternInput {
  series: Series;
  ema: readonly number[];
  levels: LevelSet;
}

export function isUptrend(lastClose: number, emaLast: number): boolean {
  return lastClose > emaLast;
}

/**
 * True when both High and Low rise strictly across the last three bars
 */
export function isHigherHighHigherLow(series: Series): boolean {
  const [first, second, third] = series.slice(-3);
  if (!first || !second || !third) {
    return false;
  }

  return (
    third.high > second.high &&
    second.high > first.high &&
    third.low > second.low &&
    second.low > first.low
  );
}

/**
 * Lowest resistance level strictly above the close, or null
 */
export function findNearestResistance(lastClose: number, resistance: readonly number[]): number | null {
  let nearest: number | null = null;
  for (const level of resistance) {
    if (level > lastClose && (nearest === null || level < nearest)) {
      nearest = level;
    }
  }
  return nearest;
}

/**
 * True when the nearest resistance above the close is within `proximity`
 * of it: lastClose >= level * (1 - proximity)
 */
export function isNearResistance(
  lastClose: number,
  resistance: readonly number[],
  proximity: number = DEFAULT_PATTERN_OPTIONS.proximity
): boolean {
  const level = findNearestResistance(lastClose, resistance);
  return level !== null && lastClose >= level * (1 - proximity);
}

/**
 * True when the latest volume exceeds `multiplier` times the mean of the
 * preceding `window - 1` volumes
 */
export function hasVolumeSpike(
  series: Series,
  window: number = DEFAULT_PATTERN_OPTIONS.volumeWindow,
  multiplier: number = DEFAULT_PATTERN_OPTIONS.volumeMultiplier
): boolean {
  const recent = series.slice(-window);
  const latest: Bar | undefined = recent[recent.length - 1];
  const prior = recent.slice(0, -1);
  if (!latest || prior.length === 0) {
    return false;
  }

  const mean = prior.reduce((sum, bar) => sum + bar.volume, 0) / prior.length;
  return latest.volume > mean * multiplier;
}

/**
 * All price-action signals for one series
 */
export function evaluatePatterns(input: PatternInput, options: PatternOptions = {}): PatternSignals {
  const proximity = options.proximity ?? DEFAULT_PATTERN_OPTIONS.proximity;
  const volumeWindow = options.volumeWindow ?? DEFAULT_PATTERN_OPTIONS.volumeWindow;
  const volumeMultiplier = options.volumeMultiplier ?? DEFAULT_PATTERN_OPTIONS.volumeMultiplier;
  assertNonNegative('proximity', proximity);
  assertPositiveInteger('volumeWindow', volumeWindow);
  assertNonNegative('volumeMultiplier', volumeMultiplier);

  const { series, ema, levels } = input;
  const lastClose = series[series.length - 1]?.close ?? Number.NaN;
  const emaLast = ema[ema.length - 1] ?? Number.NaN;

  return {
    uptrend: isUptrend(lastClose, emaLast),
    hhHl: isHigherHighHigherLow(series),
    nearResistance: isNearResistance(lastClose, levels.resistance, proximity),
    volumeSpike: hasVolumeSpike(series, volumeWindow, volumeMultiplier),
    // levels were detected; an empty side still counts
    clearLevels: true,
  };
}
