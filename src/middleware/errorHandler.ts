import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export interface AppError extends Error {
  statusCode?: number;
  isOperational?: boolean;
  code?: string;
  details?: unknown;
}

export function createAppError(statusCode: number, code: string, message: string, details?: unknown): AppError {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  error.isOperational = true;
  return error;
}

/**
 * Centralized error handler
 * Ensures all errors are returned as valid JSON
 * Format: { ok: false, error: { code: string, message: string, details?: unknown } }
 */
export function errorHandler(
  err: AppError,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const statusCode = err.statusCode || 500;
  const code = err.code || (statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST');
  const message = statusCode >= 500 && !err.isOperational
    ? 'Internal server error'
    : err.message || 'Internal server error';

  if (statusCode >= 500) {
    logger.error('Unhandled error', err, {
      requestId: res.locals.requestId,
      path: req.path,
      method: req.method,
    });
  }

  res.status(statusCode).json({
    ok: false,
    error: {
      code,
      message,
      ...(err.details !== undefined && { details: err.details }),
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    },
  });
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    requestId: res.locals.requestId,
    path: req.path,
  });
  res.status(404).json({
    ok: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
