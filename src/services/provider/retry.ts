/**
 * @fileoverview Timeout and retry wrapper for provider calls.
 *
 * Each attempt runs under its own timeout. Transient failures (retryable HTTP
 * statuses, connection errors, timeouts) are retried with exponential backoff;
 * everything else fails immediately. The caller's AbortSignal cancels the
 * whole sequence, including a pending backoff.
 */

import { ProviderError, TurnCancelledError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';

const logger = createLogger({ domain: 'provider' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** Error class names the Anthropic SDK uses for transport failures. */
const RETRYABLE_ERROR_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError']);

export interface RetryOptions {
  /** Per-attempt timeout */
  timeoutMs: number;

  /** Retries after the first attempt */
  maxRetries: number;

  /** First backoff delay; doubles per retry */
  baseDelayMs: number;

  signal?: AbortSignal;
}

/** Retryable HTTP statuses for transient upstream issues. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

function getStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  return typeof error.status === 'number' ? error.status : undefined;
}

function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('cause' in error)) {
    return undefined;
  }
  const cause = error.cause;
  if (typeof cause !== 'object' || cause === null || !('code' in cause)) {
    return undefined;
  }
  return typeof cause.code === 'string' ? cause.code : undefined;
}

/**
 * Detect failures that are worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.context?.timeout === true;
  }

  const status = getStatus(error);
  if (status !== undefined) {
    return isRetryableStatus(status);
  }

  if (!(error instanceof Error)) {
    return false;
  }
  if (RETRYABLE_ERROR_NAMES.has(error.name)) {
    return true;
  }

  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return error instanceof TypeError && (message.includes('fetch failed') || message.includes('network'));
}

/**
 * Backoff before retry number `attempt` (1-based).
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new TurnCancelledError();
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TurnCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run one attempt under a timeout. The attempt's own signal is aborted on
 * timeout or when the caller cancels.
 */
async function runAttempt<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderError(`${operation} timed out after ${timeoutMs}ms`, { timeout: true, timeoutMs }));
    }, timeoutMs);
  });

  const cancelled = new Promise<never>((_, reject) => {
    onAbort = () => {
      controller.abort();
      reject(new TurnCancelledError());
    };
    outer?.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    if (onAbort) {
      outer?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Call a provider operation with timeout, bounded retries and backoff.
 *
 * @param operation Human-readable operation label for logs
 * @throws TurnCancelledError when the caller's signal aborts
 * @throws ProviderError when attempts are exhausted or the failure is not retryable
 */
export async function withRetry<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const totalAttempts = options.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new TurnCancelledError();
    }

    try {
      return await runAttempt(operation, fn, options.timeoutMs, options.signal);
    } catch (error) {
      if (error instanceof TurnCancelledError || options.signal?.aborted) {
        throw error instanceof TurnCancelledError ? error : new TurnCancelledError();
      }

      const canRetry = attempt < totalAttempts && isRetryableError(error);
      if (!canRetry) {
        if (error instanceof ProviderError && !isRetryableError(error)) {
          throw error;
        }
        throw new ProviderError(`${operation} failed after ${attempt} attempt(s): ${errorMessage(error)}`, {
          operation,
          attempts: attempt,
          status: getStatus(error),
        });
      }

      const waitMs = backoffDelayMs(attempt, options.baseDelayMs);
      logger.warn('provider_retry', {
        operation,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
        status: getStatus(error),
        error: errorMessage(error),
      });
      await sleep(waitMs, options.signal);
    }
  }
}
