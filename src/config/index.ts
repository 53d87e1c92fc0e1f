function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 8008),
  logLevel: process.env.LOG_LEVEL || 'info',

  // Database configuration
  database: {
    url: process.env.DATABASE_URL || '',
    poolSize: intFromEnv('DB_POOL_SIZE', 5),
    maxOverflow: intFromEnv('DB_MAX_OVERFLOW', 10),
    poolTimeoutMs: intFromEnv('DB_POOL_TIMEOUT_MS', 30000),
    recycleSeconds: intFromEnv('DB_POOL_RECYCLE_SECONDS', 1800),
    idleTimeoutMs: intFromEnv('DB_IDLE_TIMEOUT_MS', 10000),
    connectTimeoutMs: intFromEnv('DB_CONNECT_TIMEOUT_MS', 10000),
    prePing: process.env.DB_PRE_PING !== 'false',
  },

  // Retry policies for database operations
  retry: {
    engine: {
      maxRetries: intFromEnv('DB_ENGINE_MAX_RETRIES', 5),
      initialBackoffMs: intFromEnv('DB_RETRY_BACKOFF_MS', 1000),
    },
    operation: {
      maxRetries: intFromEnv('DB_MAX_RETRIES', 3),
      initialBackoffMs: intFromEnv('DB_RETRY_BACKOFF_MS', 1000),
    },
  },

  // Circuit breaker config
  circuitBreaker: {
    maxFailures: intFromEnv('DB_BREAKER_MAX_FAILURES', 5),
    cooldownMs: intFromEnv('DB_BREAKER_COOLDOWN_MS', 5 * 60 * 1000), // 5 minutes
  },

  // External scoring API (OpenAI-compatible chat completions)
  ats: {
    apiUrl: process.env.ATS_API_URL || 'https://api.groq.com/openai/v1/chat/completions',
    apiKey: process.env.ATS_API_KEY || '',
    model: process.env.ATS_MODEL || 'mixtral-8x7b-32768',
    timeoutMs: intFromEnv('ATS_TIMEOUT_MS', 30000),
    retry: {
      maxRetries: intFromEnv('ATS_MAX_RETRIES', 2),
      initialBackoffMs: intFromEnv('ATS_RETRY_BACKOFF_MS', 1000),
    },
    circuitBreaker: {
      maxFailures: intFromEnv('ATS_BREAKER_MAX_FAILURES', 5),
      cooldownMs: intFromEnv('ATS_BREAKER_COOLDOWN_MS', 60 * 1000),
    },
  },

  uploads: {
    dir: process.env.UPLOAD_DIR || './uploads',
    maxBytes: intFromEnv('UPLOAD_MAX_BYTES', 10 * 1024 * 1024),
  },

  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:3000',
};

export type AppConfig = typeof config;
export type DatabaseConfig = AppConfig['database'];
