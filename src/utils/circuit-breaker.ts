import { logger } from './logger.js';
import { PersistenceUnavailableError } from './errors.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold?: number;
  resetTimeout?: number;
  halfOpenSuccessThreshold?: number;
  /** Only failures matching this predicate count towards opening the circuit */
  isFailure?: (error: unknown) => boolean;
  now?: () => number;
}

/**
 * Circuit breaker guarding the persistence backend.
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: too many consecutive failures, calls are rejected with PersistenceUnavailableError
 * - HALF_OPEN: reset timeout elapsed, a few trial calls decide whether to close again
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: CircuitState = 'CLOSED';

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeout: number;
  private readonly halfOpenSuccessThreshold: number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000;
    this.halfOpenSuccessThreshold = options.halfOpenSuccessThreshold ?? 2;
    this.isFailure = options.isFailure ?? (() => true);
    this.now = options.now ?? Date.now;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = this.now() - (this.lastFailureTime ?? 0);

      if (elapsed >= this.resetTimeout) {
        logger.info(`Circuit breaker ${this.name} transitioning to HALF_OPEN`, {
          elapsed,
          resetTimeout: this.resetTimeout,
        });
        this.state = 'HALF_OPEN';
        this.successCount = 0;
      } else {
        throw new PersistenceUnavailableError(this.name, this.resetTimeout - elapsed);
      }
    }

    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (this.isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.failureCount = 0;

    if (this.state === 'HALF_OPEN') {
      this.successCount++;

      if (this.successCount >= this.halfOpenSuccessThreshold) {
        logger.info(`Circuit breaker ${this.name} transitioning to CLOSED`, {
          successCount: this.successCount,
        });
        this.state = 'CLOSED';
        this.successCount = 0;
      }
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    this.successCount = 0;

    if (this.state === 'HALF_OPEN') {
      logger.warn(`Circuit breaker ${this.name} failed in HALF_OPEN, reopening`);
      this.state = 'OPEN';
      this.failureCount = 0;
    } else if (this.failureCount >= this.failureThreshold) {
      logger.error(`Circuit breaker ${this.name} opening due to failures`, {
        failureCount: this.failureCount,
        threshold: this.failureThreshold,
      });
      this.state = 'OPEN';
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  reset(): void {
    logger.info(`Circuit breaker ${this.name} manually reset`);
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
  }
}
