import { logger } from '../../utils/logger';
import { recordBreakerStateChange } from '../../utils/metrics';

export interface CircuitBreakerConfig {
  /** Name used in logs and metric labels */
  name: string;
  /** Number of consecutive failures before opening the circuit */
  maxFailures: number;
  /** Duration in milliseconds to keep the circuit open */
  cooldownMs: number;
  /** Clock, overridable for tests */
  now?: () => number;
}

export type BreakerState = 'open' | 'closed';

export interface CircuitBreakerStats {
  name: string;
  state: BreakerState;
  failureCount: number;
  maxFailures: number;
  cooldownMs: number;
  openUntil: number | null;
  retryAfterMs: number;
}

const DEFAULT_CONFIG: Omit<CircuitBreakerConfig, 'name'> = {
  maxFailures: 5,
  cooldownMs: 5 * 60 * 1000, // 5 minutes
};

/**
 * Consecutive-failure circuit breaker.
 *
 * Every method is synchronous, so each read-modify-write of the counters runs
 * to completion before any other request on the event loop can observe it.
 * The open -> closed transition happens lazily inside `isOpen()`.
 */
export class CircuitBreaker {
  readonly name: string;
  readonly maxFailures: number;
  readonly cooldownMs: number;
  private readonly now: () => number;

  private failureCount = 0;
  private openUntil: number | null = null;

  constructor(config: Partial<CircuitBreakerConfig> & Pick<CircuitBreakerConfig, 'name'>) {
    this.name = config.name;
    this.maxFailures = config.maxFailures ?? DEFAULT_CONFIG.maxFailures;
    this.cooldownMs = config.cooldownMs ?? DEFAULT_CONFIG.cooldownMs;
    this.now = config.now ?? Date.now;

    if (!Number.isInteger(this.maxFailures) || this.maxFailures <= 0) {
      throw new Error(`Circuit breaker ${this.name}: maxFailures must be a positive integer`);
    }
    if (!(this.cooldownMs > 0)) {
      throw new Error(`Circuit breaker ${this.name}: cooldownMs must be positive`);
    }
  }

  isOpen(): boolean {
    if (this.openUntil === null) {
      return false;
    }

    if (this.now() < this.openUntil) {
      return true;
    }

    this.openUntil = null;
    this.failureCount = 0;
    logger.info(`Circuit breaker ${this.name} closed after cooldown`);
    recordBreakerStateChange(this.name, 'open', 'closed');
    return false;
  }

  recordSuccess(): void {
    const wasOpen = this.openUntil !== null;
    this.failureCount = 0;
    this.openUntil = null;

    if (wasOpen) {
      logger.info(`Circuit breaker ${this.name} reset to closed after a successful operation`);
      recordBreakerStateChange(this.name, 'open', 'closed');
    }
  }

  /**
   * Returns true when this failure tripped the breaker.
   */
  recordFailure(): boolean {
    this.failureCount++;

    // Already open: the window stays anchored at the original trip
    if (this.openUntil !== null) {
      return false;
    }

    if (this.failureCount < this.maxFailures) {
      logger.warn(`Failure recorded for ${this.name} (count: ${this.failureCount}/${this.maxFailures})`);
      return false;
    }

    this.openUntil = this.now() + this.cooldownMs;
    logger.error(
      `Circuit breaker ${this.name} opened for ${this.cooldownMs}ms after ${this.failureCount} failures`
    );
    recordBreakerStateChange(this.name, 'closed', 'open');
    return true;
  }

  /**
   * Milliseconds until the cooldown ends; 0 when closed.
   */
  getRetryAfterMs(): number {
    if (this.openUntil === null) {
      return 0;
    }
    return Math.max(0, this.openUntil - this.now());
  }

  getStats(): CircuitBreakerStats {
    const state: BreakerState = this.isOpen() ? 'open' : 'closed';
    return {
      name: this.name,
      state,
      failureCount: this.failureCount,
      maxFailures: this.maxFailures,
      cooldownMs: this.cooldownMs,
      openUntil: this.openUntil,
      retryAfterMs: this.getRetryAfterMs(),
    };
  }
}
