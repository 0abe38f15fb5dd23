/**
 * @fileoverview Type definitions for the signalcheck logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/signalcheck.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of the pretty single-line format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /** Also append to this file */
  filePath?: string;

  /**
   * Write to the console. Turn off when only file output is wanted.
   * @default true
   */
  console?: boolean;

  /**
   * Send console output to stderr, leaving stdout to the command's own output.
   * @default false
   */
  stderr?: boolean;
}

/**
 * Context fields bound to a child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  timeframe?: string;
  request_id?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's logger interface, re-exported so packages do not import winston directly.
 */
export type Logger = WinstonLogger;
