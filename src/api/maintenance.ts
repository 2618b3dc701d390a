import type {NextFunction, Request, Response} from 'express';
import {Router} from 'express';
import {z} from 'zod';
import type {ApiDeps} from './deps.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const pruneSchema = z
  .object({olderThanDays: z.number().int().positive().optional()})
  .default({});

export function createMaintenanceRouter({store, config}: ApiDeps): Router {
  const router = Router();

  /**
   * POST /api/maintenance/prune
   * Deletes processed-message records older than the retention window.
   */
  router.post('/prune', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = pruneSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ok: false, error: parsed.error.issues[0]?.message});
      return;
    }
    const days = parsed.data.olderThanDays ?? config.processedMessageRetentionDays;
    const before = new Date(Date.now() - days * DAY_MS);
    try {
      const removed = await store.pruneProcessedMessages(before);
      console.log(`[Maintenance] Pruned ${removed} processed-message records before ${before.toISOString()}`);
      res.json({ok: true, removed, before: before.toISOString()});
    } catch (error) {
      next(error);
    }
  });

  return router;
}
