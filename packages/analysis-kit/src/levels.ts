/**
 * Level detection - swing highs and lows used as resistance and support
 *
 * Peaks follow the usual signal-processing definition: a strict local maximum
 * (flat tops resolve to their middle sample), thinned by a minimum distance
 * with the highest peaks taking precedence, then kept only if their
 * topographic prominence is large enough.
 */

import type { LevelSet, Series } from '@signalcheck/contracts';
import type { LevelOptions, SwingPointOptions } from './types.js';
import { assertNonNegative, assertPositiveInteger } from './validation.js';

export const DEFAULT_LEVEL_OPTIONS: Required<LevelOptions> = {
  lookbackBars: 50,
  minSeparation: 5,
  minProminence: 1,
  maxLevels: 3,
};

function at(values: readonly number[], index: number): number {
  return values[index] ?? Number.NaN;
}

/**
 * Indices of strict local maxima. The first and last samples never qualify.
 * A plateau counts once, at its middle index (rounded down), and only if
 * the samples on both sides of it are lower.
 */
export function findLocalMaxima(values: readonly number[]): number[] {
  const peaks: number[] = [];
  const last = values.length - 1;

  let i = 1;
  while (i < last) {
    if (at(values, i - 1) < at(values, i)) {
      let ahead = i + 1;
      while (ahead < last && at(values, ahead) === at(values, i)) {
        ahead++;
      }

      if (at(values, ahead) < at(values, i)) {
        peaks.push(Math.floor((i + ahead - 1) / 2));
        i = ahead;
      }
    }
    i++;
  }

  return peaks;
}

/**
 * Thin peaks so no two kept ones are closer than `distance` indices.
 * Peaks are visited from highest to lowest; among equal heights the later
 * peak is visited first.
 *
 * @param peaks - ascending peak indices into `values`
 */
export function selectByDistance(values: readonly number[], peaks: readonly number[], distance: number): number[] {
  const keep = peaks.map(() => true);

  const byHeight = peaks
    .map((_, position) => position)
    .sort((a, b) => at(values, at(peaks, a)) - at(values, at(peaks, b)));

  for (let n = byHeight.length - 1; n >= 0; n--) {
    const j = at(byHeight, n);
    if (!keep[j]) {
      continue;
    }

    for (let k = j - 1; k >= 0 && at(peaks, j) - at(peaks, k) < distance; k--) {
      keep[k] = false;
    }
    for (let k = j + 1; k < peaks.length && at(peaks, k) - at(peaks, j) < distance; k++) {
      keep[k] = false;
    }
  }

  return peaks.filter((_, position) => keep[position]);
}

/**
 * Topographic prominence of a peak: its height above the higher of the two
 * lowest points reached before climbing above it on either side (or hitting
 * the series edge).
 */
export function peakProminence(values: readonly number[], peak: number): number {
  const height = at(values, peak);

  let leftMin = height;
  for (let i = peak; i >= 0 && at(values, i) <= height; i--) {
    leftMin = Math.min(leftMin, at(values, i));
  }

  let rightMin = height;
  for (let i = peak; i < values.length && at(values, i) <= height; i++) {
    rightMin = Math.min(rightMin, at(values, i));
  }

  return height - Math.max(leftMin, rightMin);
}

/**
 * Find swing highs in a sequence. Pass negated lows to find swing lows.
 *
 * @returns ascending indices of kept peaks
 *
 * @example
 * ```typescript
 * findSwingPoints([1, 3, 1, 1, 1, 1, 1, 4, 1], { minSeparation: 5, minProminence: 1 });
 * // [1, 7]
 * ```
 */
export function findSwingPoints(values: readonly number[], options: SwingPointOptions = {}): number[] {
  const minSeparation = options.minSeparation ?? DEFAULT_LEVEL_OPTIONS.minSeparation;
  const minProminence = options.minProminence ?? DEFAULT_LEVEL_OPTIONS.minProminence;
  assertPositiveInteger('minSeparation', minSeparation);
  assertNonNegative('minProminence', minProminence);

  const peaks = selectByDistance(values, findLocalMaxima(values), minSeparation);
  return peaks.filter((peak) => peakProminence(values, peak) >= minProminence);
}

function recentLevels(prices: readonly number[], indices: readonly number[], maxLevels: number): number[] {
  return indices
    .slice(-maxLevels)
    .map((index) => at(prices, index))
    .sort((a, b) => a - b);
}

/**
 * Support and resistance from the trailing window of a series
 *
 * Resistance comes from swing highs of High, support from swing lows of Low.
 * Each side keeps its `maxLevels` most recent levels, ascending by price.
 * An empty side is a normal outcome.
 */
export function detectLevels(series: Series, options: LevelOptions = {}): LevelSet {
  const lookbackBars = options.lookbackBars ?? DEFAULT_LEVEL_OPTIONS.lookbackBars;
  const maxLevels = options.maxLevels ?? DEFAULT_LEVEL_OPTIONS.maxLevels;
  const swing: SwingPointOptions = {
    minSeparation: options.minSeparation,
    minProminence: options.minProminence,
  };
  assertPositiveInteger('lookbackBars', lookbackBars);
  assertPositiveInteger('maxLevels', maxLevels);

  const window = series.slice(-lookbackBars);
  const highs = window.map((bar) => bar.high);
  const lows = window.map((bar) => bar.low);

  return {
    support: recentLevels(lows, findSwingPoints(lows.map((low) => -low), swing), maxLevels),
    resistance: recentLevels(highs, findSwingPoints(highs, swing), maxLevels),
  };
}
