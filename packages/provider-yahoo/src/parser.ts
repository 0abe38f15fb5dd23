/**
 * @fileoverview Parser utilities for Yahoo Finance chart payloads.
 *
 * Converts the column-oriented chart response into a clean, ordered series.
 *
 * @module @signalcheck/provider-yahoo/parser
 */

import type { Bar } from '@signalcheck/contracts';
import { chartResponseSchema } from './types.js';
import type { YahooRawRow } from './types.js';

/**
 * Result of reading a chart payload.
 */
export type ChartParseResult =
  | { ok: true; rows: YahooRawRow[] }
  | { ok: false; cause: 'provider' | 'malformed'; reason: string };

/**
 * Validates a chart payload and zips its columns into rows.
 *
 * @example
 * ```typescript
 * const parsed = parseChartPayload(response.data);
 * if (parsed.ok) {
 *   const bars = cleanBars(parsed.rows);
 * }
 * ```
 */
export function parseChartPayload(payload: unknown): ChartParseResult {
  const validated = chartResponseSchema.safeParse(payload);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, cause: 'malformed', reason: `Unexpected chart payload${where}` };
  }

  const { chart } = validated.data;
  if (chart.error) {
    return {
      ok: false,
      cause: 'provider',
      reason: chart.error.description ?? chart.error.code ?? 'Unknown Yahoo Finance error',
    };
  }

  const result = chart.result?.[0];
  if (!result) {
    return { ok: false, cause: 'provider', reason: 'Yahoo Finance returned no chart result' };
  }

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0] ?? {};

  const rows = timestamps.map((timestamp, i) => ({
    timestamp,
    open: quote.open?.[i],
    high: quote.high?.[i],
    low: quote.low?.[i],
    close: quote.close?.[i],
    volume: quote.volume?.[i],
  }));

  return { ok: true, rows };
}

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Drops rows with a missing or non-finite field, orders by time and keeps the
 * last row seen for each timestamp.
 */
export function cleanBars(rows: readonly YahooRawRow[]): Bar[] {
  const byTime = new Map<number, Bar>();

  for (const row of rows) {
    const { timestamp, open, high, low, close, volume } = row;
    if (
      !isFiniteNumber(timestamp) ||
      !isFiniteNumber(open) ||
      !isFiniteNumber(high) ||
      !isFiniteNumber(low) ||
      !isFiniteNumber(close) ||
      !isFiniteNumber(volume)
    ) {
      continue;
    }

    const epochMs = timestamp * 1000;
    byTime.set(epochMs, {
      timestamp: new Date(epochMs).toISOString(),
      open,
      high,
      low,
      close,
      volume,
    });
  }

  return [...byTime.entries()].sort(([a], [b]) => a - b).map(([, bar]) => bar);
}
