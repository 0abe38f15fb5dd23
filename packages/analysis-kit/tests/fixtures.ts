/**
 * Shared series builders for analysis-kit tests
 */

import type { Bar } from '@signalcheck/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.parse('2025-01-01T03:45:00.000Z');

export interface BarShape {
  high: number;
  low: number;
  close: number;
  volume?: number;
}

/**
 * One daily bar per shape, open equal to close
 */
export function buildSeries(shapes: BarShape[]): Bar[] {
  return shapes.map((shape, i) => ({
    timestamp: new Date(START + i * DAY_MS).toISOString(),
    open: shape.close,
    high: shape.high,
    low: shape.low,
    close: shape.close,
    volume: shape.volume ?? 1000,
  }));
}

/**
 * 25 bars closing 100 to 124, high/low one point either side, volume 1000
 * with a final bar at 3000
 */
export function risingSeries(): Bar[] {
  return buildSeries(
    Array.from({ length: 25 }, (_, i) => ({
      high: 101 + i,
      low: 99 + i,
      close: 100 + i,
      volume: i === 24 ? 3000 : 1000,
    }))
  );
}

/**
 * Constant bars: high 101, low 99, close 100, volume 1000
 */
export function flatSeries(length = 25): Bar[] {
  return buildSeries(Array.from({ length }, () => ({ high: 101, low: 99, close: 100 })));
}

/**
 * Builds bars from parallel high and low arrays, close at the midpoint
 */
export function seriesFromHighsLows(highs: number[], lows: number[]): Bar[] {
  return buildSeries(
    highs.map((high, i) => {
      const low = lows[i] ?? high;
      return { high, low, close: (high + low) / 2 };
    })
  );
}
