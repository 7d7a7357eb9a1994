/**
 * errorHandler.ts — Global Express error handling middleware.
 *
 * This must be the LAST middleware registered (app.use(errorHandler)) so it
 * catches any error thrown or passed via next(err) from route handlers.
 *
 * Error handling strategy:
 *   - AppError instances: the error's status, `{ error, code }` plus its
 *     details (e.g. `state` on a 409 so the client can re-render without
 *     another status call).
 *   - Unexpected errors: log full details and return a generic 500.
 */
import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error('Application error', { error: err.message, code: err.code, path: req.path });
    }
    res.status(err.statusCode).json({
      ...err.details,
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Unexpected errors
  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  });

  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
  });
}
