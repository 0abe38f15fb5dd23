/**
 * Series validation run before any computation
 */

import { ComputationError, ConfigurationError, InsufficientDataError, MIN_SERIES_LENGTH } from '@signalcheck/contracts';
import type { Series } from '@signalcheck/contracts';

const BAR_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

/**
 * Check the series is long enough, fully numeric and strictly ordered in time
 *
 * @throws InsufficientDataError if the series has fewer than `minLength` bars
 * @throws ComputationError if a field is non-finite or timestamps are unordered
 */
export function validateSeries(series: Series, minLength: number = MIN_SERIES_LENGTH): void {
  if (series.length < minLength) {
    throw new InsufficientDataError(
      `Series has ${series.length} bars, at least ${minLength} required`,
      { required: minLength, received: series.length }
    );
  }

  let previousTime = Number.NEGATIVE_INFINITY;

  series.forEach((bar, index) => {
    for (const field of BAR_FIELDS) {
      if (!Number.isFinite(bar[field])) {
        throw new ComputationError(`Invalid ${field} at bar[${index}]: ${bar[field]}`, {
          stage: 'series',
          index,
        });
      }
    }

    const time = Date.parse(bar.timestamp);
    if (!Number.isFinite(time)) {
      throw new ComputationError(`Invalid timestamp at bar[${index}]: ${bar.timestamp}`, {
        stage: 'series',
        index,
      });
    }

    if (time <= previousTime) {
      throw new ComputationError(
        `Bars must be in chronological order: bar[${index}].timestamp (${bar.timestamp}) ` +
          `is not after bar[${index - 1}]`,
        { stage: 'series', index }
      );
    }
    previousTime = time;
  });
}

/**
 * @throws ConfigurationError unless value is an integer >= 1
 */
export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`, { [name]: value });
  }
}

/**
 * @throws ConfigurationError unless value is finite and >= 0
 */
export function assertNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number, got ${value}`, { [name]: value });
  }
}
