/**
 * @signalcheck/analysis-kit
 * Pure technical analysis: indicators, levels, patterns, risk and verdict
 */

// Engine entry
export { analyzeSeries } from './analyze.js';

// Indicators
export {
  computeEMA,
  computeTrueRange,
  computeATR,
  computeIndicators,
  DEFAULT_EMA_WINDOW,
  DEFAULT_ATR_WINDOW,
} from './indicators.js';

// Levels
export {
  findLocalMaxima,
  selectByDistance,
  peakProminence,
  findSwingPoints,
  detectLevels,
  DEFAULT_LEVEL_OPTIONS,
} from './levels.js';

// Patterns
export {
  isUptrend,
  isHigherHighHigherLow,
  findNearestResistance,
  isNearResistance,
  hasVolumeSpike,
  evaluatePatterns,
  DEFAULT_PATTERN_OPTIONS,
} from './patterns.js';
export type { PatternSignals, PatternInput } from './patterns.js';

// Risk
export { DEFAULT_RISK_CONFIG, validateRiskConfig, mergeRiskConfig } from './risk/risk-config.js';
export type { RiskConfig } from './risk/risk-config.js';
export { calculateRisk, roundTo } from './risk/risk-calculator.js';
export type { RiskLevels } from './risk/risk-calculator.js';

// Scoring
export {
  buildChecklist,
  countPassing,
  classifyVerdict,
  VERDICT_LABELS,
  VERDICT_THRESHOLDS,
} from './scoring/aggregator.js';

// Validation
export { validateSeries } from './validation.js';

// Types
export type {
  AnalysisOptions,
  IndicatorOptions,
  LevelOptions,
  PatternOptions,
  SwingPointOptions,
} from './types.js';
