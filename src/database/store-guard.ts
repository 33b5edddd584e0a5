import { CircuitBreaker } from '../utils/circuit-breaker.js';
import { PersistenceError, TransientIOError } from '../utils/errors.js';
import { withRetry, sleep } from '../utils/retry.js';

export interface StoreGuardOptions {
  retryAttempts: number;
  retryBaseDelayMs: number;
  failureThreshold?: number;
  resetTimeout?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wraps store calls in retry (transient failures only) inside one shared
 * circuit breaker. Once the breaker opens every call fails fast with
 * PersistenceUnavailableError.
 */
export class StoreGuard {
  readonly breaker: CircuitBreaker;
  private readonly options: StoreGuardOptions;

  constructor(options: StoreGuardOptions) {
    this.options = options;
    this.breaker = new CircuitBreaker({
      name: 'persistence',
      failureThreshold: options.failureThreshold ?? 5,
      resetTimeout: options.resetTimeout ?? 60000,
      isFailure: error => error instanceof TransientIOError || error instanceof PersistenceError,
    });
  }

  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.breaker.execute(() =>
      withRetry(fn, {
        attempts: this.options.retryAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        operation,
        sleep: this.options.sleep ?? sleep,
      })
    );
  }
}
