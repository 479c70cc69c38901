/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The error handler sits at the very END of the middleware line and catches
 * anything that went wrong upstream. Express 5 forwards rejected promises
 * from async handlers here on its own, so controllers simply throw.
 *
 * Two kinds of errors (see AppError.ts):
 *   - Operational (isOperational = true): unknown collection (404), bad
 *     collection name or query flag (400). Logged at "warn"; the client gets
 *     the statusCode and message.
 *   - Everything else, including StorageIOError: logged at "error" with the
 *     full error; the client gets a generic 500 without paths or internals.
 *
 * Express recognizes this as an error handler because it has FOUR parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
