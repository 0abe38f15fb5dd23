/**
 * @fileoverview ATR-based stop loss, target and reward-to-risk ratio.
 */

import { ComputationError } from '@signalcheck/contracts';
import { DEFAULT_RISK_CONFIG } from './risk-config.js';
import type { RiskConfig } from './risk-config.js';

export interface RiskLevels {
  stopLoss: number;
  target: number;
  /** Reward over risk, rounded to 2 decimals */
  rrRatio: number;
  goodRR: boolean;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Float slack on the goodRR comparison */
const RATIO_EPSILON = 1e-9;

/**
 * Calculate stop, target and reward ratio from the last close and ATR.
 *
 * goodRR compares the unrounded ratio within RATIO_EPSILON, so the default 2/4
 * multipliers pass a 2.00 minimum whatever the float error. Only the reported
 * rrRatio is rounded.
 *
 * @throws ComputationError if the risk distance is zero or not finite
 *
 * @example
 * ```typescript
 * calculateRisk(124, 2);
 * // { stopLoss: 120, target: 132, rrRatio: 2, goodRR: true }
 * ```
 */
export function calculateRisk(
  lastClose: number,
  atr: number,
  config: RiskConfig = DEFAULT_RISK_CONFIG
): RiskLevels {
  const stopLoss = lastClose - config.stopMultiplier * atr;
  const target = lastClose + config.targetMultiplier * atr;
  const risk = lastClose - stopLoss;

  if (!Number.isFinite(risk) || risk <= 0) {
    throw new ComputationError(`Risk distance must be positive, got ${risk} (ATR ${atr})`, {
      stage: 'risk',
      lastClose,
      atr,
    });
  }

  const ratio = (target - lastClose) / risk;

  return {
    stopLoss,
    target,
    rrRatio: roundTo(ratio, 2),
    goodRR: ratio >= config.minRewardRatio - RATIO_EPSILON,
  };
}
