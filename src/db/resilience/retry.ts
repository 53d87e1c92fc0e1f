import { logger } from '../../utils/logger';
import { delay, formatError } from '../../utils/helpers';
import { recordRetryAttempt } from '../../utils/metrics';
import { PoolTimeoutError } from './errors';

export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying */
  maxRetries: number;
  /** Delay before the first retry, doubled for every retry after it */
  initialBackoffMs: number;
}

export interface RetryOptions {
  /** Name used in log lines and metrics */
  operation: string;
  /** Decides whether an error is worth another attempt */
  isTransient?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialBackoffMs: 1000,
};

/**
 * Delay before retry number `attempt` (1-based): initial, 2x, 4x, ...
 */
export function calculateBackoff(attempt: number, initialBackoffMs: number): number {
  return initialBackoffMs * Math.pow(2, attempt - 1);
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = { operation: 'operation' }
): Promise<T> {
  const isTransient = options.isTransient ?? isTransientError;
  const sleep = options.sleep ?? delay;
  let attempts = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!isTransient(error)) {
        throw error;
      }

      attempts++;
      if (attempts > policy.maxRetries) {
        logger.error(
          `${options.operation}: maximum retries (${policy.maxRetries}) reached. Last error: ${formatError(error)}`
        );
        throw error;
      }

      const delayMs = calculateBackoff(attempts, policy.initialBackoffMs);
      logger.warn(
        `${options.operation} attempt ${attempts} failed: ${formatError(error)}. Retrying in ${delayMs}ms...`,
        { attempt: attempts, delayMs }
      );
      recordRetryAttempt(options.operation);

      await sleep(delayMs);
    }
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
]);

// SQLSTATE values for a server that is shutting down or not accepting connections yet
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

const TRANSIENT_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Connection terminated unexpectedly',
  'Connection terminated due to connection timeout',
  'Client has encountered a connection error',
];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Infrastructure-class failures: socket errors, pool timeouts and PostgreSQL
 * connection/resource/operator-intervention errors. Constraint violations,
 * syntax errors and plain programming errors are not transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PoolTimeoutError) return true;

  const code = errorCode(error);
  if (code !== undefined) {
    if (TRANSIENT_NETWORK_CODES.has(code)) return true;
    if (TRANSIENT_SQLSTATES.has(code)) return true;
    // Class 08 connection exception, 53 insufficient resources, 58 system error
    if (/^(08|53|58)[0-9A-Z]{3}$/.test(code)) return true;
  }

  if (error instanceof Error) {
    return TRANSIENT_MESSAGES.some((message) => error.message.includes(message));
  }

  return false;
}
