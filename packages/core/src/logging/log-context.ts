/**
 * @fileoverview Logging context carried through async call chains
 *
 * Session and turn identifiers reach every log line of a turn without
 * threading them through each function signature.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface LoggingContext {
  sessionId?: string;
  channel?: string;
  turn?: number;
  /** Model call within the turn, from 0 */
  round?: number;
  jobId?: string;
}

const loggingContext = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with the given logging context, merged over any parent context.
 *
 * @example
 * withLoggingContext({ sessionId: 'cli:local' }, () => {
 *   logger.info('carries sessionId');
 * });
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Current logging context, or an empty object outside withLoggingContext.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}

/**
 * Update the current context in place. No-op outside withLoggingContext.
 */
export function updateLoggingContext(updates: Partial<LoggingContext>): void {
  const store = loggingContext.getStore();
  if (store) {
    Object.assign(store, updates);
  }
}
