import { describe, it, expect } from 'vitest';
import {
  evaluatePatterns,
  findNearestResistance,
  hasVolumeSpike,
  isHigherHighHigherLow,
  isNearResistance,
  isUptrend,
} from '../src/patterns.js';
import { computeEMA } from '../src/indicators.js';
import { buildSeries, flatSeries, risingSeries } from './fixtures.js';

describe('isUptrend', () => {
  it('should require the close strictly above the EMA', () => {
    expect(isUptrend(101, 100)).toBe(true);
    expect(isUptrend(100, 100)).toBe(false);
  });
});

describe('isHigherHighHigherLow', () => {
  it('should be true for three strictly rising highs and lows', () => {
    const series = buildSeries([
      { high: 10, low: 8, close: 9 },
      { high: 11, low: 9, close: 10 },
      { high: 12, low: 10, close: 11 },
    ]);

    expect(isHigherHighHigherLow(series)).toBe(true);
  });

  it('should be falsified by a single non-increasing pair', () => {
    const equalHigh = buildSeries([
      { high: 10, low: 8, close: 9 },
      { high: 11, low: 9, close: 10 },
      { high: 11, low: 10, close: 10.5 },
    ]);
    const lowerLow = buildSeries([
      { high: 10, low: 8, close: 9 },
      { high: 11, low: 7.5, close: 10 },
      { high: 12, low: 10, close: 11 },
    ]);

    expect(isHigherHighHigherLow(equalHigh)).toBe(false);
    expect(isHigherHighHigherLow(lowerLow)).toBe(false);
  });

  it('should only look at the last three bars', () => {
    const series = buildSeries([
      { high: 50, low: 40, close: 45 },
      { high: 10, low: 8, close: 9 },
      { high: 11, low: 9, close: 10 },
      { high: 12, low: 10, close: 11 },
    ]);

    expect(isHigherHighHigherLow(series)).toBe(true);
  });

  it('should be false with fewer than three bars', () => {
    expect(isHigherHighHigherLow(flatSeries(2))).toBe(false);
  });
});

describe('findNearestResistance', () => {
  it('should take the lowest level strictly above the close', () => {
    expect(findNearestResistance(95, [110, 96, 90])).toBe(96);
    expect(findNearestResistance(96, [96])).toBeNull();
    expect(findNearestResistance(95, [])).toBeNull();
  });
});

describe('isNearResistance', () => {
  it('should be true within 2% below the nearest level', () => {
    expect(isNearResistance(99, [100, 105])).toBe(true);
    expect(isNearResistance(95, [110, 96])).toBe(true);
  });

  it('should be false further than 2% away', () => {
    expect(isNearResistance(97, [100])).toBe(false);
    expect(isNearResistance(95, [110])).toBe(false);
  });

  it('should ignore levels at or below the close', () => {
    expect(isNearResistance(101, [100])).toBe(false);
  });

  it('should honour a custom proximity', () => {
    expect(isNearResistance(97, [100], 0.05)).toBe(true);
  });
});

describe('hasVolumeSpike', () => {
  function withVolumes(volumes: number[]) {
    return buildSeries(volumes.map((volume) => ({ high: 101, low: 99, close: 100, volume })));
  }

  it('should compare the latest volume to 1.5x the preceding nine', () => {
    const base = Array.from({ length: 9 }, () => 1000);

    expect(hasVolumeSpike(withVolumes([...base, 1500]))).toBe(false);
    expect(hasVolumeSpike(withVolumes([...base, 1501]))).toBe(true);
  });

  it('should ignore bars outside the window', () => {
    const volumes = [100_000, ...Array.from({ length: 9 }, () => 1000), 2000];

    expect(hasVolumeSpike(withVolumes(volumes))).toBe(true);
  });

  it('should be false without any prior bar', () => {
    expect(hasVolumeSpike(withVolumes([5000]))).toBe(false);
  });

  it('should honour window and multiplier overrides', () => {
    const volumes = [1000, 1000, 1000, 2500];

    expect(hasVolumeSpike(withVolumes(volumes), 4, 2)).toBe(true);
    expect(hasVolumeSpike(withVolumes(volumes), 4, 3)).toBe(false);
  });
});

describe('evaluatePatterns', () => {
  it('should evaluate a rising series with a volume spike', () => {
    const series = risingSeries();

    expect(
      evaluatePatterns({ series, ema: computeEMA(series), levels: { support: [], resistance: [] } })
    ).toEqual({
      uptrend: true,
      hhHl: true,
      nearResistance: false,
      volumeSpike: true,
      clearLevels: true,
    });
  });

  it('should use the supplied resistance levels', () => {
    const series = risingSeries();

    const signals = evaluatePatterns({
      series,
      ema: computeEMA(series),
      levels: { support: [], resistance: [125] },
    });

    expect(signals.nearResistance).toBe(true);
  });
});
