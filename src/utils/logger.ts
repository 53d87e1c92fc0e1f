import winston from 'winston';
import { config } from '../config';

const isProduction = config.nodeEnv === 'production';

export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  transports: [new winston.transports.Console()],
  silent: config.nodeEnv === 'test',
});

/**
 * Stream adapter so morgan access logs go through the same transports
 */
export const httpLogStream = {
  write: (message: string): void => {
    logger.http(message.trim());
  },
};
