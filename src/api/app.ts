// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler, sendError } from './middleware/errorHandler.js';
import { requireJsonContentType } from './middleware/contentType.js';
import {
  RateLimiter,
  RateLimitPresets,
  createRateLimitMiddleware,
  type RateLimitPresetName,
} from './middleware/rateLimiter.js';
import { createAuthRouter } from './routes/auth.js';
import { createCharacterRouter } from './routes/characters.js';
import { createStatusRouter } from './routes/status.js';
import type { Services } from '@/services.js';

export interface AppOptions {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;       // null disables access logs
  rateLimitEnabled: boolean;
  rateLimiter: RateLimiter;
}

const passThrough: RequestHandler = (_req, _res, next) => next();

export function createApp(services: Services, config: Partial<AppOptions> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://localhost:5000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    rateLimitEnabled = true,
    rateLimiter = new RateLimiter(),
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Logging
  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use('/api', requireJsonContentType);
  app.use(express.json({ limit: '100kb' }));

  if (rateLimitEnabled) {
    rateLimiter.startAutomaticCleanup();
  }
  const limit = (preset: RateLimitPresetName): RequestHandler =>
    rateLimitEnabled ? createRateLimitMiddleware(rateLimiter, RateLimitPresets[preset]) : passThrough;

  // API routes
  app.use('/api', createStatusRouter({ database: services.database, status: services.status }));
  app.use('/api', createAuthRouter({
    lifecycle: services.lifecycle,
    loginGuard: services.loginGuard,
    tokens: services.tokens,
    characters: services.characters,
    limit,
  }));
  app.use('/api/characters', createCharacterRouter({
    accounts: services.database.accounts,
    characters: services.characters,
  }));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    sendError(res, 404, 'Resource not found', 'NOT_FOUND');
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
