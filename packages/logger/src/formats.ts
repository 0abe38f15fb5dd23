/**
 * @fileoverview Custom winston formats: sensitive-field redaction, standard
 * fields with request id injection, and the pretty single-line console format.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport. Case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own fields, left untouched by redaction and the pretty printer. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack', 'splat']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive field replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ provider: { baseUrl: 'https://example.test', apiKey: 'test-secret' } });
 * // { provider: { baseUrl: 'https://example.test', apiKey: '[REDACTED]' } }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Redacts sensitive metadata. Must run first in the chain.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { apiKey: 'test-secret', timeoutMs: 10000 });
 * // {"level":"info","message":"Provider configured","apiKey":"[REDACTED]","timeoutMs":10000}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp, error stacks, and the request id of the active request context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Builds the single-line pretty representation of a log entry.
 *
 * Output: `[2025-01-15T09:20:11.004+05:30] info: Analysis complete component=analysis-service symbol=TCS.NS verdict="strong"`
 */
export function renderPretty(info: Record<string, unknown>): string {
  const { timestamp, level, message, component, symbol, timeframe, request_id, ...rest } = info;

  const context: string[] = [];
  if (component) context.push(`component=${String(component)}`);
  if (symbol) context.push(`symbol=${String(symbol)}`);
  if (timeframe) context.push(`timeframe=${String(timeframe)}`);
  if (request_id) context.push(`request_id=${String(request_id)}`);

  for (const [key, value] of Object.entries(rest)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(timestamp)}] ${String(level)}: ${String(message)}${contextStr}`;

  return typeof rest['stack'] === 'string' ? `${line}\n${rest['stack']}` : line;
}

export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderPretty({ ...info }))
);
