import { Router } from 'express';
import { config } from '../config.js';
import type { Store } from '../services/store.js';

/** Health check router — provides GET /health endpoint */
export function healthRouter(store: Store): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const databaseHealthy = await store.ping();

    const response = {
      status: databaseHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      services: {
        api: 'ok',
        database: databaseHealthy ? 'ok' : 'error: unable to reach the database',
      },
      version: '1.0.0',
    };

    res.status(databaseHealthy ? 200 : 503).json(response);
  });

  return router;
}
