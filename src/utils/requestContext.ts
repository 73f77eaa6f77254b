/**
 * Request Context
 *
 * Uses Node.js `AsyncLocalStorage` to propagate request-scoped context
 * (requestId, and the compilation runId for background runs) across the
 * call chain without passing it through every function signature.
 *
 * The logger reads it automatically so every log line carries the ids.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  /** Unique identifier for the HTTP request (or CLI invocation). */
  requestId: string;
  /** Set while a season compilation run is executing. */
  runId?: string;
}

/**
 * Singleton AsyncLocalStorage instance shared across the process.
 */
export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context, or `undefined` if called outside
 * a request or run (e.g., during startup).
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}

/**
 * Run `fn` with `context` as the active request context.
 */
export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return requestContext.run(context, fn);
}

/**
 * Generate a short correlation id.
 */
export function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}
