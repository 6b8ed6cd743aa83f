/**
 * Per-call context carried through async work with AsyncLocalStorage
 *
 * A tool handler runs inside a context; every QWeather request it makes
 * picks up the same request id for its log lines.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  requestId: string;
  toolName?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithContext<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return storage.run(context, fn);
}

/**
 * Request id of the enclosing context, if any
 */
export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function generateRequestId(): string {
  return randomUUID();
}
