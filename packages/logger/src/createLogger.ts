/**
 * @fileoverview Logger factory for signalcheck.
 * Creates winston loggers with redaction, standard fields and either JSON or
 * pretty single-line output.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * The format chain is applied once, at logger level: redaction first, then the
 * standard fields, then the output format. Transports only filter by level.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * const providerLogger = logger.child({ component: 'provider-yahoo' });
 * providerLogger.info('Fetch finished', { symbol: 'TCS.NS', timeframe: '1d', count: 62 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
  } = config;

  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: stderr ? ['error', 'warn', 'info', 'debug'] : [],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // attachGlobalHandlers owns process exit
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const serviceLogger = createChildLogger(logger, { component: 'analysis-service' });
 * serviceLogger.warn('No result', { error_code: 'INSUFFICIENT_DATA' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
