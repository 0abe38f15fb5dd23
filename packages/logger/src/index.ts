/**
 * @fileoverview Public API exports for @signalcheck/logger
 * Structured logging and error handling for signalcheck
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Request context management
export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

// Timing
export { startTimer } from './perf-timer.js';

// Formats
export { redactPII, redactValue, isSensitiveFieldName, renderPretty } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
