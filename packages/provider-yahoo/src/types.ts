/**
 * @fileoverview Yahoo Finance provider types and chart payload schema.
 *
 * @module @signalcheck/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '@signalcheck/logger';

export const YAHOO_CHART_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Regular trading hours of an exchange, in its local time.
 */
export interface ExchangeSession {
  /** IANA zone, e.g. 'Asia/Kolkata' */
  timezone: string;

  /** Session open as HH:mm */
  open: string;

  /** Session close as HH:mm (inclusive) */
  close: string;
}

/** National Stock Exchange of India */
export const DEFAULT_EXCHANGE_SESSION: ExchangeSession = {
  timezone: 'Asia/Kolkata',
  open: '09:15',
  close: '15:30',
};

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Preconfigured client. Requests made through it still use `timeoutMs`.
   * @default axios.create({ baseURL })
   */
  httpClient?: AxiosInstance;

  /** Ignored when `httpClient` is supplied */
  baseUrl?: string;

  /** @default 10000 */
  timeoutMs?: number;

  /** @default DEFAULT_EXCHANGE_SESSION */
  session?: ExchangeSession;

  /** Clock used for the retrieval window */
  now?: () => Date;

  logger?: Logger;
}

const priceColumn = z.array(z.number().nullable());

/**
 * Shape of the v8 chart endpoint. Yahoo omits `timestamp` and leaves the quote
 * columns out when a range holds no bars.
 */
export const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: priceColumn.optional(),
                high: priceColumn.optional(),
                low: priceColumn.optional(),
                close: priceColumn.optional(),
                volume: priceColumn.optional(),
              })
            ),
          }),
        })
      )
      .nullable()
      .optional(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().optional(),
      })
      .nullable()
      .optional(),
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * One column-aligned row of the chart payload, before cleaning.
 */
export interface YahooRawRow {
  /** Epoch seconds */
  timestamp: number;
  open: number | null | undefined;
  high: number | null | undefined;
  low: number | null | undefined;
  close: number | null | undefined;
  volume: number | null | undefined;
}
