/**
 * Retry with exponential backoff: delay = baseDelayMs × 2^attempt
 */

import { abortError, AbortedError, RetryExhaustedError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { isTransientError } from './error-classifier.js';

export type RetryOptions = {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
  /** Called before each backoff sleep; attempt is zero-based */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Builds the terminal error once retries are spent */
  onExhausted?: (lastError: unknown, attempts: number) => Error;
  signal?: AbortSignal;
};

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * Run `fn` until it succeeds, a non-retryable error escapes,
 * or `maxRetries + 1` attempts have failed.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;
  const totalAttempts = options.maxRetries + 1;

  for (let attempt = 0; ; attempt++) {
    if (options.signal?.aborted) {
      throw abortError(options.signal);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof AbortedError || !isRetryable(error)) {
        throw error;
      }
      if (attempt + 1 >= totalAttempts) {
        throw options.onExhausted
          ? options.onExhausted(error, totalAttempts)
          : new RetryExhaustedError(totalAttempts, { cause: error });
      }

      const delayMs = backoffDelay(options.baseDelayMs, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
