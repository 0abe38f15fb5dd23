/**
 * Shared helpers for app tests
 */

import { Writable } from 'node:stream';
import winston from 'winston';
import { createLogger, type Logger } from '@signalcheck/logger';
import type { Bar, FetchOptions, FetchOutcome, MarketDataSource, Timeframe } from '@signalcheck/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.parse('2025-01-01T03:45:00.000Z');

/**
 * Daily bars closing 100, 101, ... with high/low one point either side,
 * volume 1000 and a final bar at 3000
 */
export function risingSeries(length = 25): Bar[] {
  return Array.from({ length }, (_, i) => ({
    timestamp: new Date(START + i * DAY_MS).toISOString(),
    open: 100 + i,
    high: 101 + i,
    low: 99 + i,
    close: 100 + i,
    volume: i === length - 1 ? 3000 : 1000,
  }));
}

/**
 * Bars with no range at all, so ATR is zero
 */
export function degenerateSeries(length = 25): Bar[] {
  return Array.from({ length }, (_, i) => ({
    timestamp: new Date(START + i * DAY_MS).toISOString(),
    open: 100,
    high: 100,
    low: 100,
    close: 100,
    volume: 1000,
  }));
}

export interface FetchCall {
  symbol: string;
  timeframe: Timeframe;
  options?: FetchOptions;
}

/**
 * In-memory data source
 */
export class FakeSource implements MarketDataSource {
  readonly id = 'fake';
  readonly calls: FetchCall[] = [];

  constructor(private readonly respond: () => Promise<FetchOutcome>) {}

  static returning(outcome: FetchOutcome): FakeSource {
    return new FakeSource(async () => outcome);
  }

  async fetch(symbol: string, timeframe: Timeframe, options?: FetchOptions): Promise<FetchOutcome> {
    this.calls.push({ symbol, timeframe, options });
    return this.respond();
  }
}

/**
 * JSON logger whose entries land in `entries`
 */
export function captureLogger(): { logger: Logger; entries: Array<Record<string, unknown>> } {
  const entries: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      entries.push(JSON.parse(chunk.toString()) as Record<string, unknown>);
      callback();
    },
  });

  const logger = createLogger({ level: 'debug', json: true, console: false });
  logger.add(new winston.transports.Stream({ stream }));

  return { logger, entries };
}

export const flush = () => new Promise((resolve) => setTimeout(resolve, 20));
