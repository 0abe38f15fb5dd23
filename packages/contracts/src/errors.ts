/**
 * @fileoverview Error taxonomy for the signalcheck analysis pipeline.
 *
 * Every failure the pipeline knows about is one of these classes. They carry a
 * machine-readable code and a structured data payload so the request boundary
 * can turn them into a `NoResult` and log the cause.
 *
 * @module @signalcheck/contracts/errors
 */

import type { Timeframe } from './timeframes.js';

/**
 * Base error class for all signalcheck errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SignalCheckError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SignalCheckError extends Error {
  /** Machine-readable error code (e.g., 'DATA_UNAVAILABLE'). */
  readonly code: string;

  /** Structured context for logging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SignalCheckError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/** Why a fetch produced no series. */
export type DataUnavailableCause = 'timeout' | 'aborted' | 'transport' | 'provider' | 'empty' | 'malformed';

/**
 * Market data could not be retrieved: transport failure, timeout, abort,
 * provider error payload, or nothing left after cleaning.
 *
 * @example
 * ```typescript
 * new DataUnavailableError('Request timed out after 10000ms', {
 *   symbol: 'TCS.NS',
 *   timeframe: Timeframe.D1,
 *   provider: 'yahoo',
 *   cause: 'timeout'
 * });
 * ```
 */
export class DataUnavailableError extends SignalCheckError {
  constructor(
    message: string,
    data: {
      symbol: string;
      timeframe: Timeframe;
      provider: string;
      cause: DataUnavailableCause;
      [key: string]: unknown;
    }
  ) {
    super('DATA_UNAVAILABLE', message, data);
    this.name = 'DataUnavailableError';
  }
}

/**
 * The series is too short for the indicators to be meaningful.
 */
export class InsufficientDataError extends SignalCheckError {
  constructor(
    message: string,
    data: {
      required: number;
      received: number;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_DATA', message, data);
    this.name = 'InsufficientDataError';
  }
}

/**
 * A numeric stage hit a degenerate case, e.g. a zero risk denominator
 * or a non-finite intermediate value.
 */
export class ComputationError extends SignalCheckError {
  constructor(
    message: string,
    data: {
      stage: 'series' | 'indicators' | 'levels' | 'patterns' | 'risk';
      [key: string]: unknown;
    }
  ) {
    super('COMPUTATION_ERROR', message, data);
    this.name = 'ComputationError';
  }
}

/**
 * Options or environment configuration failed validation.
 */
export class ConfigurationError extends SignalCheckError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, data);
    this.name = 'ConfigurationError';
  }
}

/** Failures the pure analysis stages may report. */
export type AnalysisError = InsufficientDataError | ComputationError;

export function isSignalCheckError(error: unknown): error is SignalCheckError {
  return error instanceof SignalCheckError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isComputationError(error: unknown): error is ComputationError {
  return error instanceof ComputationError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Type guard for the failures `analyzeSeries` reports as values.
 */
export function isAnalysisError(error: unknown): error is AnalysisError {
  return isInsufficientDataError(error) || isComputationError(error);
}
