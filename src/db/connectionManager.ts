import { Client, ClientConfig, Pool, PoolClient, PoolConfig } from 'pg';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { DatabaseConfig } from '../config';
import { logger } from '../utils/logger';
import { formatError } from '../utils/helpers';
import { resumes, schemaStatements } from './schema';
import {
  CircuitBreaker,
  CircuitBreakerStats,
  CircuitOpenError,
  DatabaseError,
  DEFAULT_RETRY_POLICY,
  PoolTimeoutError,
  RetryPolicy,
  guardedCall,
  isTransientError,
} from './resilience';

const schema = { resumes };

export type Database = NodePgDatabase<typeof schema>;

export interface Engine {
  pool: Pool;
  db: Database;
}

/**
 * One unit of work: a pooled client inside an open transaction, plus a
 * drizzle database bound to that client.
 */
export interface ScopedSession {
  client: PoolClient;
  db: Database;
}

export type PoolFactory = (options: PoolConfig) => Pool;

export interface ConnectionManagerOptions {
  database: DatabaseConfig;
  breaker: CircuitBreaker;
  engineRetry?: RetryPolicy;
  operationRetry?: RetryPolicy;
  poolFactory?: PoolFactory;
  sleep?: (ms: number) => Promise<void>;
}

export interface ConnectionHealth {
  status: 'ok' | 'unavailable' | 'not_initialized';
  breaker: CircuitBreakerStats;
  pool: { total: number; idle: number; waiting: number } | null;
}

type SessionPhase = 'begin' | 'work' | 'commit';

/**
 * Client class whose own socket connect is bounded by `connectTimeoutMs`.
 * pg-pool would apply a pool-level `connectionTimeoutMillis` to queued callers
 * as well, so the wait for a free slot is left to `poolTimeoutMs` instead.
 */
export function clientWithConnectTimeout(connectTimeoutMs: number): typeof Client {
  return class TimedClient extends Client {
    constructor(clientConfig?: string | ClientConfig) {
      super(
        typeof clientConfig === 'string'
          ? { connectionString: clientConfig, connectionTimeoutMillis: connectTimeoutMs }
          : { ...clientConfig, connectionTimeoutMillis: connectTimeoutMs }
      );
    }
  };
}

export class ConnectionManager {
  private readonly config: DatabaseConfig;
  private readonly breaker: CircuitBreaker;
  private readonly engineRetry: RetryPolicy;
  private readonly operationRetry: RetryPolicy;
  private readonly poolFactory: PoolFactory;
  private readonly sleep?: (ms: number) => Promise<void>;

  private engine: Engine | null = null;
  private pendingEngine: Promise<Engine> | null = null;

  constructor(options: ConnectionManagerOptions) {
    this.config = options.database;
    this.breaker = options.breaker;
    this.engineRetry = options.engineRetry ?? DEFAULT_RETRY_POLICY;
    this.operationRetry = options.operationRetry ?? DEFAULT_RETRY_POLICY;
    this.poolFactory = options.poolFactory ?? ((poolOptions) => new Pool(poolOptions));
    this.sleep = options.sleep;
  }

  get circuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  /**
   * Build the process-wide pool and prove it can reach the server.
   * Repeated calls return the same engine.
   */
  async createEngine(): Promise<Engine> {
    if (this.engine) {
      return this.engine;
    }
    if (!this.pendingEngine) {
      this.pendingEngine = this.buildEngine().finally(() => {
        this.pendingEngine = null;
      });
    }
    return this.pendingEngine;
  }

  private async buildEngine(): Promise<Engine> {
    if (!this.config.url) {
      throw new DatabaseError('engine creation', new Error('DATABASE_URL is not set'), false);
    }

    const engine = await this.guarded('engine creation', this.engineRetry, async () => {
      const pool = this.poolFactory(this.poolOptions());
      pool.on('error', (err: Error) => {
        logger.error('Unexpected error on idle PostgreSQL client', err);
      });

      try {
        await pool.query('SELECT 1');
      } catch (error) {
        await pool.end().catch((endError: unknown) => {
          logger.warn(`Failed to close pool after failed liveness probe: ${formatError(endError)}`);
        });
        throw error;
      }

      return { pool, db: drizzle(pool, { schema }) };
    });

    this.engine = engine;
    logger.info('Database engine created successfully');
    return engine;
  }

  private poolOptions(): PoolConfig {
    return {
      connectionString: this.config.url,
      // node-postgres has no separate overflow; the ceiling covers both
      max: this.config.poolSize + this.config.maxOverflow,
      idleTimeoutMillis: this.config.idleTimeoutMs,
      maxLifetimeSeconds: this.config.recycleSeconds,
      Client: clientWithConnectTimeout(this.config.connectTimeoutMs),
    };
  }

  /**
   * Create every table that does not exist yet.
   */
  async initSchema(): Promise<void> {
    await this.guarded('schema initialization', this.operationRetry, async () => {
      const { pool } = this.requireEngine();
      logger.info('Initializing database...');
      for (const statement of schemaStatements) {
        await pool.query(statement);
      }
    });
    logger.info('Database initialized successfully!');
  }

  /**
   * Run `work` inside a transaction on a dedicated client. Commits when it
   * resolves, rolls back when it rejects, and releases the client either way.
   */
  async withSession<T>(work: (session: ScopedSession) => Promise<T>): Promise<T> {
    const client = await this.guarded(
      'session acquisition',
      this.operationRetry,
      () => this.acquireClient(this.requireEngine().pool),
      false
    );

    let phase: SessionPhase = 'begin';
    let releaseError: Error | undefined;

    try {
      let result: T;
      try {
        await client.query('BEGIN');
        phase = 'work';
        result = await work({ client, db: drizzle(client, { schema }) });
        phase = 'commit';
        await client.query('COMMIT');
      } catch (error) {
        releaseError = await this.rollback(client);
        if (isTransientError(error)) {
          this.breaker.recordFailure();
        }
        logger.error(`Database session error during ${phase}: ${formatError(error)}`);

        if (phase === 'work') {
          throw error;
        }
        throw new DatabaseError(phase === 'begin' ? 'transaction begin' : 'commit', error, isTransientError(error));
      }

      this.breaker.recordSuccess();
      return result;
    } finally {
      client.release(releaseError);
    }
  }

  private async rollback(client: PoolClient): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (error) {
      logger.error(`Rollback failed, discarding connection: ${formatError(error)}`);
      return error instanceof Error ? error : new Error(formatError(error));
    }
  }

  private async acquireClient(pool: Pool): Promise<PoolClient> {
    const client = await this.connectWithDeadline(pool);

    if (this.config.prePing) {
      try {
        await client.query('SELECT 1');
      } catch (error) {
        // A dead connection must not go back into the pool
        client.release(error instanceof Error ? error : true);
        throw error;
      }
    }

    return client;
  }

  private connectWithDeadline(pool: Pool): Promise<PoolClient> {
    const timeoutMs = this.config.poolTimeoutMs;

    return new Promise<PoolClient>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new PoolTimeoutError(timeoutMs));
      }, timeoutMs);

      pool.connect().then(
        (client) => {
          if (settled) {
            // The caller gave up; hand the late client straight back
            client.release();
            return;
          }
          settled = true;
          clearTimeout(timer);
          resolve(client);
        },
        (error: unknown) => {
          if (settled) {
            logger.debug(`Late connection failure after pool timeout: ${formatError(error)}`);
            return;
          }
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  /**
   * Every failure leaving here names its operation: CircuitOpenError, or
   * DatabaseError wrapping the last underlying error.
   */
  private async guarded<T>(
    operation: string,
    policy: RetryPolicy,
    action: () => Promise<T>,
    reportSuccess = true
  ): Promise<T> {
    try {
      return await guardedCall(this.breaker, operation, policy, action, {
        isTransient: isTransientError,
        sleep: this.sleep,
        reportSuccess,
      });
    } catch (error) {
      if (error instanceof CircuitOpenError || error instanceof DatabaseError) {
        logger.warn(error.message);
        throw error;
      }
      throw new DatabaseError(operation, error, isTransientError(error));
    }
  }

  private requireEngine(): Engine {
    if (!this.engine) {
      throw new DatabaseError('engine lookup', new Error('engine has not been created'), false);
    }
    return this.engine;
  }

  async healthCheck(): Promise<ConnectionHealth> {
    const breaker = this.breaker.getStats();

    if (!this.engine) {
      return { status: 'not_initialized', breaker, pool: null };
    }

    const { pool } = this.engine;
    const poolStats = { total: pool.totalCount, idle: pool.idleCount, waiting: pool.waitingCount };

    if (breaker.state === 'open') {
      return { status: 'unavailable', breaker, pool: poolStats };
    }

    try {
      await pool.query('SELECT 1');
      return { status: 'ok', breaker, pool: poolStats };
    } catch (error) {
      logger.warn(`Database health probe failed: ${formatError(error)}`);
      return { status: 'unavailable', breaker, pool: poolStats };
    }
  }

  async close(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    if (engine) {
      await engine.pool.end();
      logger.info('Database connection pool closed');
    }
  }
}
