import { Request, Response, NextFunction } from 'express';
import { AppError, ParticipantError, ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    logger.warn('Request rejected', { error: err.message, status: err.statusCode, path: req.path, method: req.method });
    return res.status(err.statusCode).json({
      success: false,
      error: err.message,
    });
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof ParticipantError) {
    return res.status(502).json({
      success: false,
      error: `Participant ${err.participantId} unavailable`,
    });
  }

  if (err instanceof ServiceError) {
    return res.status(503).json({
      success: false,
      error: 'Service temporarily unavailable',
    });
  }

  // Body parser errors carry their own status
  const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
  if (status < 500) {
    return res.status(status).json({ success: false, error: err.message });
  }

  // Don't leak internal errors in production
  const message =
    process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message;

  res.status(500).json({
    success: false,
    error: message,
  });
}
