import { CircuitBreaker } from './circuitBreaker';
import { CircuitOpenError } from './errors';
import { RetryPolicy, retryWithBackoff } from './retry';
import { logger } from '../../utils/logger';
import { formatError } from '../../utils/helpers';
import { recordBlockedRequest } from '../../utils/metrics';

export interface GuardOptions {
  isTransient: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Set false when success is only known later, e.g. after a commit */
  reportSuccess?: boolean;
}

/**
 * Retry `action` under `policy`, checking the breaker before every attempt.
 * An open breaker fails the call with CircuitOpenError, which is never retried.
 * Transient failures count against the breaker; other errors leave it alone.
 * The failure that trips the breaker ends the sequence with that failure.
 */
export async function guardedCall<T>(
  breaker: CircuitBreaker,
  operation: string,
  policy: RetryPolicy,
  action: () => Promise<T>,
  options: GuardOptions
): Promise<T> {
  const reportSuccess = options.reportSuccess ?? true;
  let tripped = false;

  return retryWithBackoff(
    async () => {
      if (breaker.isOpen()) {
        recordBlockedRequest(breaker.name);
        throw new CircuitOpenError(operation, breaker.getRetryAfterMs());
      }

      try {
        const result = await action();
        if (reportSuccess) {
          breaker.recordSuccess();
        }
        return result;
      } catch (error) {
        if (options.isTransient(error) && breaker.recordFailure()) {
          tripped = true;
          logger.warn(`${operation}: circuit breaker ${breaker.name} opened, not retrying. Last error: ${formatError(error)}`);
        }
        throw error;
      }
    },
    policy,
    { operation, isTransient: (error) => !tripped && options.isTransient(error), sleep: options.sleep }
  );
}
