import { config } from '../config';
import { CircuitBreaker } from './resilience';
import { ConnectionManager } from './connectionManager';

// One breaker for the one database this process talks to
export const dbCircuitBreaker = new CircuitBreaker({
  name: 'database',
  maxFailures: config.circuitBreaker.maxFailures,
  cooldownMs: config.circuitBreaker.cooldownMs,
});

export const connectionManager = new ConnectionManager({
  database: config.database,
  breaker: dbCircuitBreaker,
  engineRetry: config.retry.engine,
  operationRetry: config.retry.operation,
});

// Graceful shutdown
export async function closeDatabase(): Promise<void> {
  await connectionManager.close();
}

export { ConnectionManager } from './connectionManager';
export type { Database, Engine, ScopedSession, ConnectionHealth, PoolFactory } from './connectionManager';

// Re-export schema
export * from './schema';
