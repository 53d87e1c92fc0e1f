import { Counter, Histogram, Gauge, Registry, register as defaultRegister } from 'prom-client';
import { logger } from './logger';

export const metricsRegistry: Registry = defaultRegister;

// ===== Counters =====

/**
 * Circuit breaker state changes
 */
export const breakerStateChangesCounter = new Counter({
  name: 'resume_ats_breaker_state_changes_total',
  help: 'Circuit breaker state transitions',
  labelNames: ['breaker', 'fromState', 'toState'],
  registers: [metricsRegistry],
});

/**
 * Calls rejected because the circuit was open
 */
export const breakerRequestsBlockedCounter = new Counter({
  name: 'resume_ats_breaker_requests_blocked_total',
  help: 'Number of calls blocked by an open circuit breaker',
  labelNames: ['breaker'],
  registers: [metricsRegistry],
});

export const retryAttemptsCounter = new Counter({
  name: 'resume_ats_retry_attempts_total',
  help: 'Retries scheduled after a transient failure',
  labelNames: ['operation'],
  registers: [metricsRegistry],
});

export const resumeUploadsCounter = new Counter({
  name: 'resume_ats_resume_uploads_total',
  help: 'Resume uploads by outcome',
  labelNames: ['status'], // 'stored', 'rejected', 'failed'
  registers: [metricsRegistry],
});

// ===== Histograms =====

export const atsScoringLatencyHistogram = new Histogram({
  name: 'resume_ats_scoring_duration_ms',
  help: 'Latency of ATS scoring calls in milliseconds',
  labelNames: ['result'],
  buckets: [250, 500, 1000, 2000, 5000, 10000, 30000],
  registers: [metricsRegistry],
});

// ===== Gauges =====

/**
 * Circuit breaker state (0=closed, 1=open)
 */
export const breakerStateGauge = new Gauge({
  name: 'resume_ats_breaker_state',
  help: 'Circuit breaker state (0=closed, 1=open)',
  labelNames: ['breaker'],
  registers: [metricsRegistry],
});

// ===== Helper Functions =====

export function recordBreakerStateChange(breaker: string, fromState: string, toState: string): void {
  try {
    breakerStateChangesCounter.labels(breaker, fromState, toState).inc();
    breakerStateGauge.labels(breaker).set(toState === 'open' ? 1 : 0);
  } catch (error) {
    logger.error('[Metrics] Error recording breaker state change', { error });
  }
}

export function recordBlockedRequest(breaker: string): void {
  try {
    breakerRequestsBlockedCounter.labels(breaker).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording blocked request', { error });
  }
}

export function recordRetryAttempt(operation: string): void {
  try {
    retryAttemptsCounter.labels(operation).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording retry attempt', { error });
  }
}

export function recordResumeUpload(status: 'stored' | 'rejected' | 'failed'): void {
  try {
    resumeUploadsCounter.labels(status).inc();
  } catch (error) {
    logger.error('[Metrics] Error recording resume upload', { error });
  }
}

export function recordScoringLatency(result: 'success' | 'failure', latencyMs: number): void {
  try {
    atsScoringLatencyHistogram.labels(result).observe(latencyMs);
  } catch (error) {
    logger.error('[Metrics] Error recording scoring latency', { error });
  }
}

/**
 * Get all metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}
