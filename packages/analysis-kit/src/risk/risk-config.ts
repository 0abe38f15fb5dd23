/**
 * @fileoverview Risk configuration: ATR multipliers for stop and target, and
 * the reward ratio a setup needs to pass.
 */

import { ConfigurationError } from '@signalcheck/contracts';

export interface RiskConfig {
  /** Stop distance below the close, in ATRs (default: 2) */
  stopMultiplier: number;
  /** Target distance above the close, in ATRs (default: 4) */
  targetMultiplier: number;
  /** Minimum reward-to-risk ratio for the goodRR signal (default: 2) */
  minRewardRatio: number;
}

/**
 * Defaults give a ratio of exactly 2, so goodRR always passes with them.
 * Raise minRewardRatio or change a multiplier to make the check selective.
 */
export const DEFAULT_RISK_CONFIG: Readonly<RiskConfig> = Object.freeze({
  stopMultiplier: 2,
  targetMultiplier: 4,
  minRewardRatio: 2,
});

const RISK_CONFIG_KEYS = ['stopMultiplier', 'targetMultiplier', 'minRewardRatio'] as const;

/**
 * Validate risk configuration.
 *
 * @throws ConfigurationError if any value is not a positive finite number
 */
export function validateRiskConfig(config: RiskConfig): void {
  for (const key of RISK_CONFIG_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${key} must be a positive number, got ${String(value)}`, {
        [key]: value,
      });
    }
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function mergeRiskConfig(overrides?: Partial<RiskConfig>): RiskConfig {
  const config: RiskConfig = {
    stopMultiplier: overrides?.stopMultiplier ?? DEFAULT_RISK_CONFIG.stopMultiplier,
    targetMultiplier: overrides?.targetMultiplier ?? DEFAULT_RISK_CONFIG.targetMultiplier,
    minRewardRatio: overrides?.minRewardRatio ?? DEFAULT_RISK_CONFIG.minRewardRatio,
  };
  validateRiskConfig(config);
  return config;
}
