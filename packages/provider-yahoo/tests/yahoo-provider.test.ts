/**
 * @fileoverview Tests for the Yahoo Finance provider.
 *
 * Requests go through an in-process axios adapter; nothing reaches the network.
 */

import { describe, it, expect } from 'vitest';
import axios, { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { ConfigurationError, Timeframe } from '@signalcheck/contracts';
import type { DataUnavailableError } from '@signalcheck/contracts';
import type { FetchOutcome } from '@signalcheck/contracts';
import { YahooProvider } from '../src/yahoo-provider.js';

interface ChartRow {
  t: number;
  o: number | null;
  h: number | null;
  l: number | null;
  c: number | null;
  v: number | null;
}

/** Epoch seconds for a UTC wall-clock time. */
function epoch(iso: string): number {
  return Date.parse(iso) / 1000;
}

function chartPayload(rows: ChartRow[]): unknown {
  return {
    chart: {
      result: [
        {
          meta: { currency: 'INR', symbol: 'TCS.NS' },
          timestamp: rows.map((row) => row.t),
          indicators: {
            quote: [
              {
                open: rows.map((row) => row.o),
                high: rows.map((row) => row.h),
                low: rows.map((row) => row.l),
                close: rows.map((row) => row.c),
                volume: rows.map((row) => row.v),
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

function respond(config: InternalAxiosRequestConfig, data: unknown, status = 200): AxiosResponse {
  return { data, status, statusText: status === 200 ? 'OK' : 'Error', headers: {}, config };
}

function stubProvider(
  handler: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>,
  timeoutMs?: number
): { provider: YahooProvider; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = (config) => {
    calls.push(config);
    return handler(config);
  };

  const provider = new YahooProvider({
    httpClient: axios.create({ baseURL: 'https://chart.example.test', adapter }),
    now: () => new Date('2025-03-15T10:00:00.000Z'),
    timeoutMs,
  });

  return { provider, calls };
}

function expectFailure(outcome: FetchOutcome): DataUnavailableError {
  if (outcome.ok) {
    throw new Error('Expected a failed fetch');
  }
  return outcome.error;
}

describe('YahooProvider', () => {
  describe('request', () => {
    it('should request the daily window with the normalized symbol', async () => {
      const { provider, calls } = stubProvider(async (config) => respond(config, chartPayload([
        { t: epoch('2025-03-14T03:45:00Z'), o: 100, h: 102, l: 99, c: 101, v: 1000 },
      ])));

      await provider.fetch(' tcs.ns ', Timeframe.D1);

      expect(calls).toHaveLength(1);
      expect(calls[0]?.url).toBe('/TCS.NS');
      expect(calls[0]?.timeout).toBe(10000);
      expect(calls[0]?.params).toEqual({
        interval: '1d',
        period1: epoch('2024-12-15T10:00:00Z'),
        period2: epoch('2025-03-15T10:00:00Z'),
        includePrePost: false,
        events: 'div,splits',
      });
    });

    it.each([
      { timeframe: Timeframe.M5, interval: '5m', start: '2025-03-08T10:00:00Z' },
      { timeframe: Timeframe.M15, interval: '15m', start: '2025-02-28T10:00:00Z' },
      { timeframe: Timeframe.H1, interval: '60m', start: '2025-02-13T10:00:00Z' },
      { timeframe: Timeframe.H4, interval: '60m', start: '2025-01-14T10:00:00Z' },
      { timeframe: Timeframe.W1, interval: '1wk', start: '2024-03-15T10:00:00Z' },
      { timeframe: Timeframe.MN1, interval: '1mo', start: '2023-03-15T10:00:00Z' },
    ])('should map $timeframe to interval $interval', async ({ timeframe, interval, start }) => {
      const { provider, calls } = stubProvider(async (config) => respond(config, chartPayload([])));

      await provider.fetch('INFY.NS', timeframe);

      expect(calls[0]?.params).toMatchObject({ interval, period1: epoch(start) });
    });

    it('should apply the configured timeout to an injected client', async () => {
      const { provider, calls } = stubProvider(async (config) => respond(config, chartPayload([])), 2500);

      await provider.fetch('TCS.NS', Timeframe.D1);

      expect(calls[0]?.timeout).toBe(2500);
    });
  });

  describe('cleaning', () => {
    it('should drop incomplete rows, sort, and keep the last duplicate', async () => {
      const first = epoch('2025-03-13T03:45:00Z');
      const second = epoch('2025-03-14T03:45:00Z');
      const { provider } = stubProvider(async (config) =>
        respond(config, chartPayload([
          { t: second, o: 100, h: 102, l: 99, c: 101, v: 1000 },
          { t: epoch('2025-03-12T03:45:00Z'), o: 101, h: 103, l: 100, c: null, v: 1200 },
          { t: second, o: 100.5, h: 102.5, l: 99.5, c: 101.5, v: 1100 },
          { t: first, o: 98, h: 100, l: 97, c: 99, v: 900 },
        ]))
      );

      const outcome = await provider.fetch('TCS.NS', Timeframe.D1);

      expect(outcome).toEqual({
        ok: true,
        series: [
          { timestamp: '2025-03-13T03:45:00.000Z', open: 98, high: 100, low: 97, close: 99, volume: 900 },
          { timestamp: '2025-03-14T03:45:00.000Z', open: 100.5, high: 102.5, low: 99.5, close: 101.5, volume: 1100 },
        ],
      });
    });

    it('should keep only bars inside the session window, both ends included', async () => {
      const { provider } = stubProvider(async (config) =>
        respond(config, chartPayload([
          // 09:00, 09:15, 15:30 and 15:45 IST
          { t: epoch('2025-01-15T03:30:00Z'), o: 1, h: 1, l: 1, c: 1, v: 1 },
          { t: epoch('2025-01-15T03:45:00Z'), o: 2, h: 2, l: 2, c: 2, v: 2 },
          { t: epoch('2025-01-15T10:00:00Z'), o: 3, h: 3, l: 3, c: 3, v: 3 },
          { t: epoch('2025-01-15T10:15:00Z'), o: 4, h: 4, l: 4, c: 4, v: 4 },
        ]))
      );

      const outcome = await provider.fetch('TCS.NS', Timeframe.H1);

      expect(outcome.ok && outcome.series.map((bar) => bar.timestamp)).toEqual([
        '2025-01-15T03:45:00.000Z',
        '2025-01-15T10:00:00.000Z',
      ]);
    });

    it('should not session-filter daily bars', async () => {
      const { provider } = stubProvider(async (config) =>
        respond(config, chartPayload([
          { t: epoch('2025-01-15T00:00:00Z'), o: 1, h: 1, l: 1, c: 1, v: 1 },
        ]))
      );

      const outcome = await provider.fetch('TCS.NS', Timeframe.D1);

      expect(outcome.ok && outcome.series).toHaveLength(1);
    });

    it('should aggregate hourly bars into 4h buckets from the session open', async () => {
      const hourly: ChartRow[] = [
        '2025-01-15T03:45:00Z',
        '2025-01-15T04:45:00Z',
        '2025-01-15T05:45:00Z',
        '2025-01-15T06:45:00Z',
        '2025-01-15T07:45:00Z',
        '2025-01-15T08:45:00Z',
        '2025-01-15T09:45:00Z',
        '2025-01-16T03:45:00Z',
      ].map((iso, i) => ({ t: epoch(iso), o: 100 + i, h: 101 + i, l: 99 + i, c: 100.5 + i, v: 10 * (i + 1) }));
      const { provider } = stubProvider(async (config) => respond(config, chartPayload(hourly)));

      const outcome = await provider.fetch('TCS.NS', Timeframe.H4);

      expect(outcome).toEqual({
        ok: true,
        series: [
          { timestamp: '2025-01-15T03:45:00.000Z', open: 100, high: 104, low: 99, close: 103.5, volume: 100 },
          { timestamp: '2025-01-15T07:45:00.000Z', open: 104, high: 107, low: 103, close: 106.5, volume: 180 },
          { timestamp: '2025-01-16T03:45:00.000Z', open: 107, high: 108, low: 106, close: 107.5, volume: 80 },
        ],
      });
    });
  });

  describe('failures', () => {
    it('should report an unknown symbol from an HTTP 404 chart error', async () => {
      const { provider } = stubProvider(async (config) => {
        const response = respond(
          config,
          { chart: { result: null, error: { code: 'Not Found', description: 'No data found, symbol may be delisted' } } },
          404
        );
        throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, response);
      });

      const error = expectFailure(await provider.fetch('NOPE.NS', Timeframe.D1));

      expect(error.code).toBe('DATA_UNAVAILABLE');
      expect(error.message).toBe('Yahoo Finance responded with HTTP 404: No data found, symbol may be delisted');
      expect(error.data).toEqual({ symbol: 'NOPE.NS', timeframe: '1d', provider: 'yahoo', cause: 'provider' });
    });

    it('should report a timeout after a single attempt', async () => {
      const { provider, calls } = stubProvider(async (config) => {
        throw new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config);
      });

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1));

      expect(error.message).toBe('Request timed out after 10000ms');
      expect(error.data?.['cause']).toBe('timeout');
      expect(calls).toHaveLength(1);
    });

    it('should report transport failures', async () => {
      const { provider } = stubProvider(async (config) => {
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
      });

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1));

      expect(error.message).toBe('connect ECONNREFUSED 127.0.0.1:443');
      expect(error.data?.['cause']).toBe('transport');
    });

    it('should not send a request that is already cancelled', async () => {
      const { provider, calls } = stubProvider(async (config) => respond(config, chartPayload([])));
      const controller = new AbortController();
      controller.abort();

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1, { signal: controller.signal }));

      expect(error.data?.['cause']).toBe('aborted');
      expect(calls).toHaveLength(0);
    });

    it('should report a chart error in a successful response', async () => {
      const { provider } = stubProvider(async (config) =>
        respond(config, { chart: { result: null, error: { code: 'Bad Request', description: 'Invalid interval' } } })
      );

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1));

      expect(error.message).toBe('Invalid interval');
      expect(error.data?.['cause']).toBe('provider');
    });

    it('should report a malformed payload', async () => {
      const { provider } = stubProvider(async (config) => respond(config, '<html>blocked</html>'));

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1));

      expect(error.message).toBe('Unexpected chart payload');
      expect(error.data?.['cause']).toBe('malformed');
    });

    it('should report an empty range', async () => {
      const { provider } = stubProvider(async (config) =>
        respond(config, { chart: { result: [{ indicators: { quote: [{}] } }], error: null } })
      );

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.D1));

      expect(error.message).toBe('No bars returned for TCS.NS (1d)');
      expect(error.data?.['cause']).toBe('empty');
    });

    it('should report a series emptied by session filtering', async () => {
      const { provider } = stubProvider(async (config) =>
        respond(config, chartPayload([{ t: epoch('2025-01-15T12:00:00Z'), o: 1, h: 1, l: 1, c: 1, v: 1 }]))
      );

      const error = expectFailure(await provider.fetch('TCS.NS', Timeframe.M15));

      expect(error.data?.['cause']).toBe('empty');
    });

    it('should reject a blank symbol without a request', async () => {
      const { provider, calls } = stubProvider(async (config) => respond(config, chartPayload([])));

      const error = expectFailure(await provider.fetch('   ', Timeframe.D1));

      expect(error.message).toBe('Symbol must be a non-empty string');
      expect(calls).toHaveLength(0);
    });
  });

  describe('configuration', () => {
    it('should reject an invalid exchange session', () => {
      expect(() => new YahooProvider({ session: { timezone: 'Asia/Kolkata', open: '9:15', close: '15:30' } })).toThrow(
        ConfigurationError
      );
      expect(() => new YahooProvider({ session: { timezone: 'Mars/Olympus', open: '09:15', close: '15:30' } })).toThrow(
        'Unknown timezone: Mars/Olympus'
      );
      expect(() => new YahooProvider({ session: { timezone: 'Asia/Kolkata', open: '15:30', close: '09:15' } })).toThrow(
        'Session open must be before session close'
      );
    });
  });
});
