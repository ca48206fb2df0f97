import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

// Inbound ids end up in every log line of the request.
const INBOUND_REQUEST_ID = /^[A-Za-z0-9._:-]{1,64}$/;

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with `context` merged over the enclosing scope, so a dialog id
 * set by a route joins the request id set by the app middleware.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

export function createRequestId(prefix = 'req'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Reuse a caller's `x-request-id` when it is a plain token; otherwise mint one.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  if (candidate !== undefined && INBOUND_REQUEST_ID.test(candidate)) {
    return candidate;
  }
  return createRequestId();
}
