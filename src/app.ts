import express, { Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { config } from './config';
import apiRoutes from './api/index';
import { errorHandler } from './api/middleware/errorHandler';
import { connectionManager } from './db';
import { atsCircuitBreaker } from './services/atsService';
import { logger, httpLogStream } from './utils/logger';
import { getMetrics } from './utils/metrics';

export function createApp(): Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: config.corsOrigin, credentials: true }));
  app.use(express.json());
  app.use(morgan('combined', { stream: httpLogStream }));

  // Health check endpoint
  app.get('/health', async (_req, res) => {
    const database = await connectionManager.healthCheck();
    const scoring = atsCircuitBreaker.getStats();
    const healthy = database.status === 'ok' && scoring.state === 'closed';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database,
      scoring,
    });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', 'text/plain; version=0.0.4');
      const metrics = await getMetrics();
      res.send(metrics);
    } catch (error) {
      logger.error('Error generating metrics:', error);
      res.status(500).send('Error generating metrics');
    }
  });

  // API routes
  app.use('/api', apiRoutes);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
