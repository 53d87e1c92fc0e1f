export { CircuitBreaker } from './circuitBreaker';
export type { CircuitBreakerConfig, CircuitBreakerStats, BreakerState } from './circuitBreaker';
export { retryWithBackoff, calculateBackoff, isTransientError, DEFAULT_RETRY_POLICY } from './retry';
export type { RetryPolicy, RetryOptions } from './retry';
export { CircuitOpenError, DatabaseError, PoolTimeoutError } from './errors';
export { guardedCall } from './guard';
export type { GuardOptions } from './guard';
