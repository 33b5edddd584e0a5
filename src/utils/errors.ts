/**
 * Error taxonomy for the detection pipeline.
 *
 * Every error carries a stable code so logs, detection results and the REST
 * layer can classify failures without string matching.
 */

export const ERROR_CODES = {
  TRANSIENT_IO: 'TRANSIENT_IO',
  DATA_INTEGRITY: 'DATA_INTEGRITY',
  CONFIGURATION: 'CONFIGURATION',
  CONCURRENT_RUN_REJECTED: 'CONCURRENT_RUN_REJECTED',
  RUN_CANCELLED: 'RUN_CANCELLED',
  PERSISTENCE_UNAVAILABLE: 'PERSISTENCE_UNAVAILABLE',
  PERSISTENCE: 'PERSISTENCE',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class DetectionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Store or transport temporarily unavailable; safe to retry */
export class TransientIOError extends DetectionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.TRANSIENT_IO, message, options);
  }
}

/** Store rejected the operation for a non-transient reason */
export class PersistenceError extends DetectionError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.PERSISTENCE, `${operation}: ${message}`, options);
    this.operation = operation;
  }
}

/** Malformed item or missing required field */
export class DataIntegrityError extends DetectionError {
  readonly itemRef: string;
  readonly issues: string[];

  constructor(itemRef: string, issues: string[]) {
    super(ERROR_CODES.DATA_INTEGRITY, `Invalid item ${itemRef}: ${issues.join('; ')}`);
    this.itemRef = itemRef;
    this.issues = issues;
  }
}

export class ConfigurationError extends DetectionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ERROR_CODES.CONFIGURATION, `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ConcurrentRunRejectedError extends DetectionError {
  readonly activeRunId: string;

  constructor(activeRunId: string) {
    super(ERROR_CODES.CONCURRENT_RUN_REJECTED, `Detection run ${activeRunId} is already in progress`);
    this.activeRunId = activeRunId;
  }
}

export class RunCancelledError extends DetectionError {
  constructor(message = 'Detection run cancelled') {
    super(ERROR_CODES.RUN_CANCELLED, message);
  }
}

/** Raised while the persistence circuit breaker is open */
export class PersistenceUnavailableError extends DetectionError {
  readonly retryInMs: number;

  constructor(name: string, retryInMs: number) {
    super(
      ERROR_CODES.PERSISTENCE_UNAVAILABLE,
      `Circuit breaker ${name} is OPEN. Rejecting request. Retry in ${Math.ceil(retryInMs / 1000)}s`
    );
    this.retryInMs = retryInMs;
  }
}

/**
 * Errors that abort a whole run rather than a single item
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof PersistenceUnavailableError || error instanceof RunCancelledError;
}

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientIOError;
}
