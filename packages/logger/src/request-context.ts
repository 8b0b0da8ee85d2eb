/**
 * @fileoverview Request-scoped context via AsyncLocalStorage.
 *
 * Every log entry written inside {@link withRequestContext} picks up the same
 * `request_id`, so one CLI invocation or one screening run can be traced
 * across provider, cache and strategy logs.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  request_id: string;
  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * The context of the innermost {@link withRequestContext} call, if any.
 */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Runs `fn` inside a fresh request context.
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Screening watchlist'); // includes request_id
 *   await service.screenSymbols(['AAPL', 'MSFT']);
 * }, undefined, { command: 'screen' });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    request_id: requestId ?? randomUUID(),
    ...additionalContext,
  };

  return storage.run(context, fn);
}
