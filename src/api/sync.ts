import type {NextFunction, Request, Response} from 'express';
import {Router} from 'express';
import type {ApiDeps} from './deps.js';

export function createSyncRouter({poller}: ApiDeps): Router {
  const router = Router();

  /**
   * POST /api/sync
   * Runs one inbox poll cycle now and returns its summary.
   */
  router.post('/', async (_req: Request, res: Response, next: NextFunction) => {
    if (!poller) {
      res.status(503).json({ok: false, error: 'Inbox polling is not configured'});
      return;
    }
    try {
      const summary = await poller.runOnce();
      if (!summary) {
        res.status(409).json({ok: false, error: 'A poll cycle is already running'});
        return;
      }
      res.json({ok: true, summary});
    } catch (error) {
      console.error('[Sync API] Poll cycle failed:', error);
      next(error);
    }
  });

  return router;
}
