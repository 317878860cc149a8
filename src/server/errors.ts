import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../types/index.js';
import { createLogger } from '../logger/index.js';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request', details?: unknown) {
    super(400, message, details);
    this.name = 'BadRequestError';
  }
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: unknown;
  };
}

/**
 * Body-parser failures carry a status and a type; treat them as client errors
 */
function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

/**
 * Global error handler middleware.
 */
export function createErrorHandler(logger: Logger = createLogger('server')) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof NotFoundError) {
      logger.warn(`${err.name}: ${err.message}`, { method: req.method, path: req.path });
    } else {
      logger.error(`${err.name}: ${err.message}`, { method: req.method, path: req.path, stack: err.stack });
    }

    if (err instanceof AppError) {
      const response: ErrorResponse = {
        error: { message: err.message, code: err.name },
      };
      if (err.details !== undefined) {
        response.error.details = err.details;
      }
      res.status(err.statusCode).json(response);
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const response: ErrorResponse = { error: { message: err.message, code: 'BadRequestError' } };
      res.status(clientStatus).json(response);
      return;
    }

    const response: ErrorResponse = {
      error: {
        message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
        code: 'INTERNAL_ERROR',
      },
    };
    res.status(500).json(response);
  };
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): Promise<void> => {
    return Promise.resolve(fn(req, res, next)).catch(next);
  };
}
