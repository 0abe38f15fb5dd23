/**
 * @fileoverview Millisecond timers for `duration_ms` log fields.
 */

import { performance } from 'node:perf_hooks';

export interface PerfTimer {
  readonly startTime: number;

  /** Elapsed milliseconds so far (or final duration once stopped) */
  elapsed(): number;

  /** Freezes the timer; later calls return the same duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Starts a high-resolution timer. Durations are rounded to whole milliseconds.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const outcome = await source.fetch(symbol, timeframe);
 * logger.info('Fetch finished', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
