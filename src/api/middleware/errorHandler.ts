// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '@/utils/errors.js';
import { describeError, httpLogger } from '@/utils/logger.js';

const GENERIC_ERROR = 'An unexpected error occurred';

export interface ErrorBody {
  error: string;
  code: string;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      const cause = err.details?.cause;
      httpLogger.error('Request failed', {
        method: req.method,
        path: req.path,
        error: err.message,
        cause: typeof cause === 'string' ? cause : undefined,
      });
      sendError(res, err.statusCode, GENERIC_ERROR, err.code);
      return;
    }
    sendError(res, err.statusCode, err.message, err.code);
    return;
  }

  if (err instanceof ZodError) {
    sendError(res, 400, err.issues[0]?.message ?? 'Invalid request', 'VALIDATION_ERROR');
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    sendError(res, 400, 'Malformed JSON body', 'VALIDATION_ERROR');
    return;
  }

  httpLogger.error('Unexpected error', {
    method: req.method,
    path: req.path,
    error: describeError(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  // Never leak internals
  sendError(res, 500, GENERIC_ERROR, 'INTERNAL_ERROR');
}

export function sendError(res: Response, statusCode: number, error: string, code: string): void {
  const body: ErrorBody = { error, code };
  res.status(statusCode).json(body);
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
