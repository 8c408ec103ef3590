/**
 * Request Context
 *
 * Carries the correlation ID of a citizen complaint, and the operation that
 * handles it, through classification, resolution and letter drafting. Read by
 * the logger; the storage itself stays private to this module.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  /** Route or operation that opened the context (e.g. "/solve", "seed") */
  operation?: string;
  classifierStrategy?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Correlation ID of the current context, or a fresh one outside any context
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/** Same as runWithContext, for entry points that await the whole run */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return storage.run(context, fn);
}
