import type {Request, Response} from 'express';
import {Router} from 'express';
import {healthCheck} from '../db/connection.js';
import type {ApiDeps} from './deps.js';

export function createHealthRouter({config, store, poller}: ApiDeps): Router {
  const router = Router();

  /**
   * Overall status: state store reachable, Google and extraction
   * configured, poller state.
   */
  router.get('/', async (_req: Request, res: Response) => {
    let storeStatus: {reachable: boolean; error?: string};
    try {
      await store.getStats();
      storeStatus = {reachable: true};
    } catch (error) {
      storeStatus = {
        reachable: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    const healthy = storeStatus.reachable;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      stateStore: {kind: config.stateStore, ...storeStatus},
      google: {
        clientId: config.google.clientId ? 'configured' : 'missing',
        refreshToken: config.google.refreshToken ? 'configured' : 'missing',
        calendarId: config.google.calendarId,
      },
      extraction: {
        apiKey: config.extraction.apiKey ? 'configured' : 'missing',
        model: config.extraction.model,
      },
      poller: poller ? {enabled: true, ...poller.status} : {enabled: false},
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Database health check. Returns 503 when MongoDB does not answer a ping.
   */
  router.get('/db', async (_req: Request, res: Response) => {
    if (config.stateStore !== 'mongodb') {
      res.status(200).json({
        status: 'healthy',
        database: 'not used',
        stateStore: config.stateStore,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const startTime = Date.now();
    try {
      const healthy = await healthCheck();
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'unhealthy',
        database: healthy ? 'connected' : 'disconnected',
        duration: `${Date.now() - startTime}ms`,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        database: 'error',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
