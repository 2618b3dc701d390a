import type {NextFunction, Request, Response} from 'express';
import {Router} from 'express';
import type {ApiDeps} from './deps.js';

export function createMetricsRouter({metrics, store}: ApiDeps): Router {
  const router = Router();

  /**
   * GET /api/metrics
   * Counter snapshot plus state store statistics.
   */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await store.getStats();
      res.json({...metrics.snapshot(), store: stats, timestamp: new Date().toISOString()});
    } catch (error) {
      next(error);
    }
  });

  return router;
}
