/**
 * @fileoverview Exchange session handling for intraday bars.
 *
 * All clock arithmetic happens in the exchange's own timezone, so a bar's
 * position in the session does not depend on the host's zone.
 *
 * @module @signalcheck/provider-yahoo/session
 */

import moment from 'moment-timezone';
import type { Bar } from '@signalcheck/contracts';
import { ConfigurationError } from '@signalcheck/contracts';
import type { ExchangeSession } from './types.js';

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const MINUTES_PER_BUCKET = 4 * 60;

/**
 * Parses an HH:mm clock time to minutes after midnight.
 *
 * @throws {ConfigurationError} If the value is not a 24-hour HH:mm time
 */
export function parseClockTime(value: string): number {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new ConfigurationError(`Invalid session time: ${value}. Expected HH:mm`, { value });
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Checks the session up front so a bad zone or clock time fails at construction.
 *
 * @throws {ConfigurationError}
 */
export function validateSession(session: ExchangeSession): void {
  if (!moment.tz.zone(session.timezone)) {
    throw new ConfigurationError(`Unknown timezone: ${session.timezone}`, {
      timezone: session.timezone,
    });
  }

  const open = parseClockTime(session.open);
  const close = parseClockTime(session.close);
  if (open >= close) {
    throw new ConfigurationError('Session open must be before session close', {
      open: session.open,
      close: session.close,
    });
  }
}

function minuteOfDay(local: moment.Moment): number {
  return local.hours() * 60 + local.minutes();
}

/**
 * Keeps bars stamped inside the session window, both ends included.
 *
 * @example
 * ```typescript
 * // 09:10 IST is dropped, 09:15 and 15:30 IST are kept
 * filterToSession(bars, DEFAULT_EXCHANGE_SESSION);
 * ```
 */
export function filterToSession(bars: readonly Bar[], session: ExchangeSession): Bar[] {
  const open = parseClockTime(session.open);
  const close = parseClockTime(session.close);

  return bars.filter((bar) => {
    const minute = minuteOfDay(moment.tz(bar.timestamp, session.timezone));
    return minute >= open && minute <= close;
  });
}

/**
 * Groups session bars into 4-hour buckets counted from each day's session
 * open. Input must be sorted and already filtered to the session.
 *
 * Each bucket is stamped with its start time: open is the first bar's open,
 * high the max, low the min, close the last bar's close, volume the sum.
 */
export function aggregateToSessionBuckets(bars: readonly Bar[], session: ExchangeSession): Bar[] {
  const open = parseClockTime(session.open);
  const buckets: Bar[] = [];
  let currentKey: string | null = null;

  for (const bar of bars) {
    const local = moment.tz(bar.timestamp, session.timezone);
    const day = local.format('YYYY-MM-DD');
    const index = Math.floor((minuteOfDay(local) - open) / MINUTES_PER_BUCKET);
    const key = `${day}#${index}`;

    const last = buckets[buckets.length - 1];
    if (key !== currentKey || !last) {
      const start = moment
        .tz(`${day} ${session.open}`, 'YYYY-MM-DD HH:mm', session.timezone)
        .add(index * MINUTES_PER_BUCKET, 'minutes');

      buckets.push({
        timestamp: start.toISOString(),
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume,
      });
      currentKey = key;
      continue;
    }

    buckets[buckets.length - 1] = {
      timestamp: last.timestamp,
      open: last.open,
      high: Math.max(last.high, bar.high),
      low: Math.min(last.low, bar.low),
      close: bar.close,
      volume: last.volume + bar.volume,
    };
  }

  return buckets;
}
