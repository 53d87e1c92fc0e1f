import { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import { logger } from '../../utils/logger';
import { isHttpError } from '../../utils/errors';
import { CircuitOpenError, DatabaseError } from '../../db/resilience';

function statusFor(err: Error, res: Response): number {
  if (err instanceof CircuitOpenError) return 503;
  if (err instanceof DatabaseError) return 500;
  if (err instanceof MulterError) return 400;
  if (isHttpError(err)) return err.statusCode;
  return res.statusCode >= 400 ? res.statusCode : 500;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  const statusCode = statusFor(err, res);

  if (statusCode >= 500) {
    logger.error('Error occurred:', err);
  } else {
    logger.warn(`Request rejected (${statusCode}): ${err.message}`);
  }

  if (err instanceof CircuitOpenError) {
    res.set('Retry-After', String(Math.max(1, Math.ceil(err.retryAfterMs / 1000))));
  }

  res.status(statusCode).json({
    error: {
      message: err.message,
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    },
  });
}
