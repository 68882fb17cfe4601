/**
 * QueryGate - Health Route
 */

import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../server/middleware/errorHandler.js';

export type DatabaseProbe = () => Promise<boolean>;

type DatabaseStatus = 'connected' | 'unreachable' | 'not_configured';

/**
 * GET /health
 *
 * 200 while the service can answer; 503 when a configured database does not
 * respond. Without a database the guard still validates, so that is healthy.
 */
export function createHealthRouter(probe?: DatabaseProbe): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      let database: DatabaseStatus = 'not_configured';
      if (probe !== undefined) {
        database = (await probe()) ? 'connected' : 'unreachable';
      }

      const healthy = database !== 'unreachable';
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        database,
        timestamp: new Date().toISOString(),
      });
    })
  );

  return router;
}

export default createHealthRouter;
