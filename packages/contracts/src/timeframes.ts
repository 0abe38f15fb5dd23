/**
 * @fileoverview Timeframe enumeration and per-timeframe retrieval profiles.
 *
 * Values match the interval labels used by the chart front end ('5m', '1d', ...).
 * Every timeframe is bound to a fixed lookback period and an intraday flag that
 * decides whether bars are restricted to the exchange session window.
 *
 * @module @signalcheck/contracts/timeframes
 */

/**
 * Supported chart timeframes, ordered from smallest to largest.
 *
 * @invariant All timeframes must be ordered from smallest to largest duration
 */
export enum Timeframe {
  /** 5-minute bars */
  M5 = '5m',
  /** 15-minute bars */
  M15 = '15m',
  /** 1-hour bars */
  H1 = '1h',
  /** 4-hour bars (aggregated from hourly data) */
  H4 = '4h',
  /** Daily bars */
  D1 = '1d',
  /** Weekly bars */
  W1 = '1wk',
  /** Monthly bars */
  MN1 = '1mo',
}

/** Calendar unit of a retrieval lookback. */
export type LookbackUnit = 'days' | 'months' | 'years';

/**
 * Fixed retrieval settings for a timeframe.
 */
export interface TimeframeProfile {
  /** Display label */
  label: string;

  /** How far back the data source reaches */
  lookback: {
    amount: number;
    unit: LookbackUnit;
  };

  /** True when bars must be restricted to the exchange session window */
  intraday: boolean;
}

const TIMEFRAME_PROFILES: Record<Timeframe, TimeframeProfile> = {
  [Timeframe.M5]: { label: '5 Minutes', lookback: { amount: 7, unit: 'days' }, intraday: true },
  [Timeframe.M15]: { label: '15 Minutes', lookback: { amount: 15, unit: 'days' }, intraday: true },
  [Timeframe.H1]: { label: '1 Hour', lookback: { amount: 30, unit: 'days' }, intraday: true },
  [Timeframe.H4]: { label: '4 Hours', lookback: { amount: 60, unit: 'days' }, intraday: true },
  [Timeframe.D1]: { label: 'Daily', lookback: { amount: 3, unit: 'months' }, intraday: false },
  [Timeframe.W1]: { label: 'Weekly', lookback: { amount: 1, unit: 'years' }, intraday: false },
  [Timeframe.MN1]: { label: 'Monthly', lookback: { amount: 2, unit: 'years' }, intraday: false },
};

const TIMEFRAME_ORDER: readonly Timeframe[] = [
  Timeframe.M5,
  Timeframe.M15,
  Timeframe.H1,
  Timeframe.H4,
  Timeframe.D1,
  Timeframe.W1,
  Timeframe.MN1,
];

/**
 * Validates whether a string is a valid Timeframe enum value.
 *
 * @example
 * ```typescript
 * isValidTimeframe('1d')   // true
 * isValidTimeframe('30m')  // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return TIMEFRAME_ORDER.some((tf) => tf === value);
}

/**
 * Parses a string into a Timeframe, throwing if invalid.
 *
 * @throws {Error} If value is not a valid timeframe
 */
export function parseTimeframe(value: string): Timeframe {
  if (!isValidTimeframe(value)) {
    throw new Error(`Invalid timeframe: ${value}. Must be one of: ${TIMEFRAME_ORDER.join(', ')}`);
  }
  return value;
}

/**
 * Returns the fixed retrieval profile of a timeframe.
 *
 * @example
 * ```typescript
 * getTimeframeProfile(Timeframe.H4).lookback  // { amount: 60, unit: 'days' }
 * ```
 */
export function getTimeframeProfile(timeframe: Timeframe): TimeframeProfile {
  return TIMEFRAME_PROFILES[timeframe];
}

export function getTimeframeLabel(timeframe: Timeframe): string {
  return TIMEFRAME_PROFILES[timeframe].label;
}

export function isIntradayTimeframe(timeframe: Timeframe): boolean {
  return TIMEFRAME_PROFILES[timeframe].intraday;
}

/**
 * Returns all supported timeframes in ascending order (smallest to largest).
 */
export function getAllTimeframes(): Timeframe[] {
  return [...TIMEFRAME_ORDER];
}
