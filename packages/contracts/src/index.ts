/**
 * @fileoverview Main entry point for @signalcheck/contracts package.
 *
 * Exports all types, classes, and utilities shared across the workspace.
 *
 * @module @signalcheck/contracts
 */

// Timeframes
export {
  Timeframe,
  isValidTimeframe,
  parseTimeframe,
  getTimeframeProfile,
  getTimeframeLabel,
  isIntradayTimeframe,
  getAllTimeframes,
} from './timeframes.js';
export type { TimeframeProfile, LookbackUnit } from './timeframes.js';

// Market data types
export type { Bar, Series } from './market.js';
export { MIN_SERIES_LENGTH, normalizeSymbol } from './market.js';

// Analysis types
export type {
  SignalName,
  SignalMap,
  Verdict,
  IndicatorSet,
  LevelSet,
  ChecklistEntry,
  AnalysisResult,
  AnalysisOutcome,
  AnalysisResponse,
  NoResult,
  FetchOutcome,
  FetchOptions,
  MarketDataSource,
} from './analysis.js';
export { SIGNAL_NAMES, SIGNAL_LABELS, isNoResult } from './analysis.js';

// Error classes and guards
export {
  SignalCheckError,
  DataUnavailableError,
  InsufficientDataError,
  ComputationError,
  ConfigurationError,
  isSignalCheckError,
  isDataUnavailableError,
  isInsufficientDataError,
  isComputationError,
  isConfigurationError,
  isAnalysisError,
} from './errors.js';
export type { AnalysisError, DataUnavailableCause } from './errors.js';
