/**
 * Option types for analysis-kit
 * Every stage is a pure function of the series and these options
 */

import type { RiskConfig } from './risk/risk-config.js';

export interface IndicatorOptions {
  /** EMA span (default: 50) */
  emaWindow?: number;

  /** ATR averaging window (default: 14) */
  atrWindow?: number;
}

/**
 * Swing point filter, matching the peak rules of common signal libraries:
 * a minimum index distance between peaks and a minimum topographic prominence
 */
export interface SwingPointOptions {
  /** Minimum index distance between two kept peaks (default: 5) */
  minSeparation?: number;

  /** Minimum prominence a peak needs to be kept (default: 1) */
  minProminence?: number;
}

export interface LevelOptions extends SwingPointOptions {
  /** Trailing bars the detector looks at (default: 50) */
  lookbackBars?: number;

  /** Most recent levels kept per side (default: 3) */
  maxLevels?: number;
}

export interface PatternOptions {
  /** Fractional distance below resistance that counts as near (default: 0.02) */
  proximity?: number;

  /** Bars in the volume window, latest included (default: 10) */
  volumeWindow?: number;

  /** Latest volume must exceed the prior mean times this (default: 1.5) */
  volumeMultiplier?: number;
}

/**
 * Options accepted by analyzeSeries
 */
export interface AnalysisOptions extends IndicatorOptions {
  levels?: LevelOptions;
  patterns?: PatternOptions;
  risk?: Partial<RiskConfig>;
}
