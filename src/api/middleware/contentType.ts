// API layer: Content-Type guard
// POST bodies under /api must be JSON

import type { Request, Response, NextFunction } from 'express';
import { sendError } from './errorHandler.js';

export function requireJsonContentType(req: Request, res: Response, next: NextFunction): void {
  const contentType = req.headers['content-type'];

  // An absent header is let through; the body then reads as empty
  if (req.method === 'POST' && contentType && !contentType.includes('application/json')) {
    sendError(res, 415, 'Content-Type must be application/json', 'UNSUPPORTED_MEDIA_TYPE');
    return;
  }

  next();
}
