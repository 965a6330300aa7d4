// API layer: Status routes

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { ServerStatus } from '@/application/status/ServerStatus.js';
import type { DatabaseService } from '@/infrastructure/database/DatabaseService.js';

export interface StatusRouterDeps {
  database: Pick<DatabaseService, 'checkHealth'>;
  status: ServerStatus;
}

export function createStatusRouter(deps: StatusRouterDeps): Router {
  const router = Router();

  /**
   * GET /health
   * Liveness plus a storage probe; a failed probe reports "degraded"
   */
  router.get('/health', (_req: Request, res: Response) => {
    const database = deps.database.checkHealth();

    res.json({
      status: database === 'healthy' ? 'healthy' : 'degraded',
      message: 'Server is running',
      database,
    });
  });

  /**
   * GET /server-status
   */
  router.get(
    '/server-status',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await deps.status.snapshot());
    })
  );

  return router;
}
