// ---------------------------------------------------------------------------
// Bounded retry for gateway calls: exponential backoff with full jitter,
// cut short when the caller aborts.
// ---------------------------------------------------------------------------

import { TransportError } from "../core/errors.js";

export interface RetryOptions {
  /** Retries after the first attempt; 0 disables retrying. */
  maxRetries: number;
  /** Ceiling of the first backoff; doubles on every further attempt. */
  baseDelayMs: number;
  /** Defaults to retrying `TransportError` only. */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting ends a pending backoff and stops further attempts. */
  signal?: AbortSignal;
}

function isTransportFailure(error: unknown): boolean {
  return error instanceof TransportError;
}

/** Random delay in `[0, baseDelayMs * 2^attempt]`. */
function backoffDelay(attempt: number, baseDelayMs: number): number {
  return Math.round(Math.random() * baseDelayMs * 2 ** attempt);
}

/** Resolve after `ms`, or as soon as `signal` aborts. */
function waitForBackoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying retryable failures up to `maxRetries` times.
 *
 * The error of the last attempt is rethrown once attempts run out, the
 * error is not retryable, or the signal has been aborted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, baseDelayMs, shouldRetry = isTransportFailure, signal } =
    options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (signal?.aborted || !shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }

      await waitForBackoff(backoffDelay(attempt, baseDelayMs), signal);
      if (signal?.aborted) throw error;
    }
  }
}
