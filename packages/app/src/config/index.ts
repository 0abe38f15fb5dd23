/**
 * Configuration loading and management
 */

import { ConfigurationError } from '@signalcheck/contracts';
import type { AnalysisOptions } from '@signalcheck/analysis-kit';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: unknown };

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment and defaults
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  return result.data;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(target: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Engine options from the analysis section
 */
export function getAnalysisOptions(config: Config): AnalysisOptions {
  const { analysis } = config;
  return {
    emaWindow: analysis.emaWindow,
    atrWindow: analysis.atrWindow,
    levels: {
      lookbackBars: analysis.levelLookbackBars,
      minSeparation: analysis.levelMinSeparation,
      minProminence: analysis.levelMinProminence,
    },
    risk: {
      stopMultiplier: analysis.riskStopMultiplier,
      targetMultiplier: analysis.riskTargetMultiplier,
      minRewardRatio: analysis.riskMinRewardRatio,
    },
  };
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    provider: {
      baseUrl: config.provider.baseUrl,
      timeoutMs: config.provider.timeoutMs,
    },
    exchange: `${config.exchange.timezone} ${config.exchange.sessionOpen}-${config.exchange.sessionClose}`,
    cache: config.cache.enabled ? `enabled (ttl ${config.cache.ttlMs}ms, max ${config.cache.maxEntries})` : 'disabled',
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
