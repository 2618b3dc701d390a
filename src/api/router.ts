import {Router} from 'express';
import type {ApiDeps} from './deps.js';
import {createHealthRouter} from './health.js';
import {createMaintenanceRouter} from './maintenance.js';
import {createMessagesRouter} from './messages.js';
import {createMetricsRouter} from './metrics.js';
import {createSyncRouter} from './sync.js';

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();
  router.use('/health', createHealthRouter(deps));
  router.use('/metrics', createMetricsRouter(deps));
  router.use('/messages', createMessagesRouter(deps));
  router.use('/sync', createSyncRouter(deps));
  router.use('/maintenance', createMaintenanceRouter(deps));
  return router;
}
