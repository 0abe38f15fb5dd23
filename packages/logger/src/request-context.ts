/**
 * @fileoverview Request-scoped context on AsyncLocalStorage.
 *
 * Every analysis request runs inside one context, so each log line it emits
 * carries the same `request_id` without threading it through call signatures.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4 unless supplied) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a fresh request context.
 *
 * @example
 * ```typescript
 * await withRequestContext(() => service.analyze('TCS.NS', Timeframe.D1), undefined, {
 *   symbol: 'TCS.NS'
 * });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId ?? generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}
