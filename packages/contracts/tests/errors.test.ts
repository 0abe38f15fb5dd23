/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../src/errors.js';
import { Timeframe } from '../src/timeframes.js';

describe('SignalCheckError', () => {
  it('should create error with code and message', () => {
    const error = new SignalCheckError('TEST_CODE', 'Test message');

    expect(error.name).toBe('SignalCheckError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new SignalCheckError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new SignalCheckError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new SignalCheckError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('SignalCheckError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.message).toBe('Test message');
    expect(parsed.data).toEqual({ key: 'value' });
  });
});

describe('DataUnavailableError', () => {
  it('should carry provider context', () => {
    const error = new DataUnavailableError('Request timed out after 10000ms', {
      symbol: 'TCS.NS',
      timeframe: Timeframe.D1,
      provider: 'yahoo',
      cause: 'timeout',
    });

    expect(error.name).toBe('DataUnavailableError');
    expect(error.code).toBe('DATA_UNAVAILABLE');
    expect(error.data?.['symbol']).toBe('TCS.NS');
    expect(error.data?.['timeframe']).toBe('1d');
    expect(error.data?.['cause']).toBe('timeout');
  });
});

describe('InsufficientDataError', () => {
  it('should serialize required and received counts', () => {
    const error = new InsufficientDataError('Need at least 20 bars, received 12', {
      required: 20,
      received: 12,
    });

    const parsed = JSON.parse(JSON.stringify(error.toJSON()));

    expect(parsed.code).toBe('INSUFFICIENT_DATA');
    expect(parsed.data.required).toBe(20);
    expect(parsed.data.received).toBe(12);
  });
});

describe('ComputationError', () => {
  it('should name the failing stage', () => {
    const error = new ComputationError('Risk denominator is zero', { stage: 'risk', atr: 0 });

    expect(error.name).toBe('ComputationError');
    expect(error.code).toBe('COMPUTATION_ERROR');
    expect(error.data?.['stage']).toBe('risk');
  });
});

describe('Type Guards', () => {
  const base = new SignalCheckError('TEST', 'message');
  const unavailable = new DataUnavailableError('message', {
    symbol: 'INFY.NS',
    timeframe: Timeframe.H1,
    provider: 'yahoo',
    cause: 'empty',
  });
  const insufficient = new InsufficientDataError('message', { required: 20, received: 3 });
  const computation = new ComputationError('message', { stage: 'indicators' });
  const configuration = new ConfigurationError('message');
  const nativeError = new Error('native');

  it('isSignalCheckError should match every subclass', () => {
    expect(isSignalCheckError(base)).toBe(true);
    expect(isSignalCheckError(unavailable)).toBe(true);
    expect(isSignalCheckError(configuration)).toBe(true);
    expect(isSignalCheckError(nativeError)).toBe(false);
    expect(isSignalCheckError({ code: 'FAKE' })).toBe(false);
    expect(isSignalCheckError(undefined)).toBe(false);
  });

  it('should match only their own class', () => {
    expect(isDataUnavailableError(unavailable)).toBe(true);
    expect(isDataUnavailableError(insufficient)).toBe(false);
    expect(isInsufficientDataError(insufficient)).toBe(true);
    expect(isInsufficientDataError(computation)).toBe(false);
    expect(isComputationError(computation)).toBe(true);
    expect(isComputationError(base)).toBe(false);
    expect(isConfigurationError(configuration)).toBe(true);
  });

  it('isAnalysisError should accept only engine failures', () => {
    expect(isAnalysisError(insufficient)).toBe(true);
    expect(isAnalysisError(computation)).toBe(true);
    expect(isAnalysisError(unavailable)).toBe(false);
    expect(isAnalysisError(nativeError)).toBe(false);
  });
});
