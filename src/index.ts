import 'dotenv/config';
import { config } from './config';
import { createApp } from './app';
import { connectionManager, closeDatabase } from './db';
import { storageService } from './services/storageService';
import { logger } from './utils/logger';

const app = createApp();
const port = config.port;

// Initialize connections and start server
async function startServer() {
  try {
    await connectionManager.createEngine();
    await connectionManager.initSchema();
    await storageService.initialize();

    const server = app.listen(port, () => {
      logger.info(`Resume ATS service listening on port ${port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
    });

    const shutdown = (signal: string) => {
      logger.info(`${signal} signal received: closing HTTP server`);
      server.close(() => {
        closeDatabase()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Failed to close database pool:', error);
            process.exit(1);
          });
      });
    };

    // Handle graceful shutdown
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
