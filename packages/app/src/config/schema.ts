/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

const positiveInt = z.number().int().positive();

const positiveNumber = z.number().positive();

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  provider: z
    .object({
      baseUrl: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
      timeoutMs: positiveInt.default(10000),
    })
    .default({}),

  exchange: z
    .object({
      timezone: z.string().min(1).default('Asia/Kolkata'),
      sessionOpen: clockTime.default('09:15'),
      sessionClose: clockTime.default('15:30'),
    })
    .default({}),

  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlMs: positiveInt.default(300000), // 5 minutes
      maxEntries: positiveInt.default(100),
    })
    .default({}),

  analysis: z
    .object({
      emaWindow: positiveInt.default(50),
      atrWindow: positiveInt.default(14),
      levelLookbackBars: positiveInt.default(50),
      levelMinSeparation: positiveInt.default(5),
      levelMinProminence: z.number().nonnegative().default(1),
      riskStopMultiplier: positiveNumber.default(2),
      riskTargetMultiplier: positiveNumber.default(4),
      riskMinRewardRatio: positiveNumber.default(2),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  YAHOO_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  EXCHANGE_TIMEZONE: 'exchange.timezone',
  SESSION_OPEN: 'exchange.sessionOpen',
  SESSION_CLOSE: 'exchange.sessionClose',
  CACHE_ENABLED: 'cache.enabled',
  CACHE_TTL_MS: 'cache.ttlMs',
  CACHE_MAX_ENTRIES: 'cache.maxEntries',
  EMA_WINDOW: 'analysis.emaWindow',
  ATR_WINDOW: 'analysis.atrWindow',
  LEVEL_LOOKBACK_BARS: 'analysis.levelLookbackBars',
  LEVEL_MIN_SEPARATION: 'analysis.levelMinSeparation',
  LEVEL_MIN_PROMINENCE: 'analysis.levelMinProminence',
  RISK_STOP_MULTIPLIER: 'analysis.riskStopMultiplier',
  RISK_TARGET_MULTIPLIER: 'analysis.riskTargetMultiplier',
  RISK_MIN_REWARD_RATIO: 'analysis.riskMinRewardRatio',
};
