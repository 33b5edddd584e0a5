import { logger, errorMessage } from './logger.js';
import { isTransientError } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  baseDelayMs: number;
  operation: string;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs fn, retrying transient failures with exponential backoff
 * (baseDelayMs, 2x, 4x, ...). Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }

      const delay = options.baseDelayMs * Math.pow(2, attempt - 1);
      logger.warn(`${options.operation} failed, retrying`, {
        attempt,
        maxAttempts: attempts,
        delayMs: delay,
        error: errorMessage(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}
