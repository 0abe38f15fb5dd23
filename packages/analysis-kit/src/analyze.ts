/**
 * @fileoverview Engine entry point: one series in, one frozen result out.
 */

import { isAnalysisError } from '@signalcheck/contracts';
import type { AnalysisOutcome, AnalysisResult, LevelSet, Series, SignalMap } from '@signalcheck/contracts';
import type { AnalysisOptions } from './types.js';
import { validateSeries } from './validation.js';
import { computeIndicators } from './indicators.js';
import { detectLevels } from './levels.js';
import { evaluatePatterns } from './patterns.js';
import { mergeRiskConfig } from './risk/risk-config.js';
import { calculateRisk } from './risk/risk-calculator.js';
import { classifyVerdict, countPassing } from './scoring/aggregator.js';

/**
 * Analyze a series: indicators and levels, then patterns and risk, then the verdict.
 *
 * Insufficient data and numeric degeneracy come back as `{ ok: false }`.
 * Anything else, including a ConfigurationError for bad options, is thrown.
 *
 * @example
 * ```typescript
 * const outcome = analyzeSeries(series, { risk: { minRewardRatio: 2.5 } });
 * if (outcome.ok) {
 *   console.log(outcome.result.verdict, outcome.result.passingCount);
 * }
 * ```
 */
export function analyzeSeries(series: Series, options: AnalysisOptions = {}): AnalysisOutcome {
  try {
    return { ok: true, result: runPipeline(series, options) };
  } catch (error) {
    if (isAnalysisError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

function runPipeline(series: Series, options: AnalysisOptions): AnalysisResult {
  const riskConfig = mergeRiskConfig(options.risk);
  validateSeries(series);

  const { ema, atr } = computeIndicators(series, options);
  const detected = detectLevels(series, options.levels);

  const lastClose = series[series.length - 1]?.close ?? Number.NaN;
  const emaLast = ema[ema.length - 1] ?? Number.NaN;

  const patterns = evaluatePatterns({ series, ema, levels: detected }, options.patterns);
  const { stopLoss, target, rrRatio, goodRR } = calculateRisk(lastClose, atr, riskConfig);

  const signals: SignalMap = Object.freeze({ ...patterns, goodRR });
  const passingCount = countPassing(signals);

  const levels: LevelSet = Object.freeze({
    support: Object.freeze([...detected.support]),
    resistance: Object.freeze([...detected.resistance]),
  });

  return Object.freeze({
    signals,
    passingCount,
    verdict: classifyVerdict(passingCount),
    stopLoss,
    target,
    rrRatio,
    atr,
    levels,
    lastClose,
    emaLast,
  });
}
