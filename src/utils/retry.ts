/**
 * Retry with bounded exponential backoff.
 */

import { logger } from "./logger.js";

export interface IRetryOptions {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly shouldRetry?: ((error: unknown, attempt: number) => boolean) | undefined;
  /** Server-suggested wait, e.g. from a retry-after header. */
  readonly delayHintMs?: ((error: unknown) => number | undefined) | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly sleep?: ((ms: number, signal?: AbortSignal) => Promise<void>) | undefined;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Retries exhausted after ${attempts} attempts`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

const DEFAULT_RETRY_OPTIONS: IRetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
};

/**
 * Execute a function with exponential backoff retry.
 *
 * Errors rejected by `shouldRetry` are rethrown unchanged. When every attempt
 * fails with a retryable error a {@link RetryExhaustedError} wrapping the last
 * one is thrown instead.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<IRetryOptions>,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const pause = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (opts.shouldRetry && !opts.shouldRetry(error, attempt)) {
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        throw new RetryExhaustedError(attempt + 1, error);
      }

      const backoff = Math.min(opts.baseDelayMs * Math.pow(2, attempt), opts.maxDelayMs);
      const hinted = opts.delayHintMs?.(error);
      const delay = hinted !== undefined ? Math.min(hinted, opts.maxDelayMs) : backoff;

      logger.warn(
        { attempt: attempt + 1, maxRetries: opts.maxRetries, delayMs: delay },
        "Retrying after error",
      );

      await pause(delay, opts.signal);
    }
  }
}

/**
 * Sleep for a specified duration. Resolves early if the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
