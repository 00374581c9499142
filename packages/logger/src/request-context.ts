/**
 * @fileoverview Request context using AsyncLocalStorage
 * Each command run gets a request_id that follows it through every await,
 * so log entries from the loader and the command can be correlated.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4 unless supplied) */
  request_id: string;

  /** Operation the request performs, e.g. "levels" */
  operation?: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * The active request context, or undefined outside withRequestContext
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Run a function inside a new request context.
 *
 * @param fn - Work to run; sync or async
 * @param requestId - ID to use instead of a generated one
 * @param additionalContext - Extra fields stored alongside the ID
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Loading bars'); // entry carries request_id
 *   return provider.getDailyBars(params);
 * }, undefined, { operation: 'levels' });
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

/**
 * Merge fields into the active context.
 *
 * @returns false when called outside a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = requestContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
