import { formatError } from '../../utils/helpers';

/**
 * Raised without attempting the guarded operation while a breaker is open.
 * Never retried.
 */
export class CircuitOpenError extends Error {
  readonly operation: string;
  readonly retryAfterMs: number;

  constructor(operation: string, retryAfterMs: number) {
    super(`Circuit breaker is open; ${operation} not attempted. Service unavailable, try again later.`);
    this.name = 'CircuitOpenError';
    this.operation = operation;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * A database operation that failed for good: either a transient error that
 * outlived its retries, or a non-transient failure of the operation itself.
 */
export class DatabaseError extends Error {
  readonly operation: string;
  readonly transient: boolean;

  constructor(operation: string, cause: unknown, transient: boolean) {
    super(`Database ${operation} failed: ${formatError(cause)}`, { cause });
    this.name = 'DatabaseError';
    this.operation = operation;
    this.transient = transient;
  }
}

export class PoolTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a pooled connection`);
    this.name = 'PoolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
