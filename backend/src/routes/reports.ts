import { Router } from 'express';
import { authMiddleware } from '../middleware/auth.js';
import { rbacMiddleware } from '../middleware/rbac.js';
import { parseInput } from '../middleware/validate.js';
import { jobSummary, materialConsumption, workerPerformance } from '../services/reportService.js';
import type { Store } from '../services/store.js';
import { reportRangeQuerySchema } from '../types/job.js';

/** Owner-only aggregate reports */
export function reportsRouter(store: Store): Router {
  const router = Router();

  router.use(authMiddleware(store), rbacMiddleware(['owner']));

  router.get('/worker-performance', async (_req, res) => {
    res.json({ data: await workerPerformance(store) });
  });

  router.get('/job-summary', async (_req, res) => {
    res.json({ data: await jobSummary(store) });
  });

  router.get('/material-consumption', async (req, res) => {
    const range = parseInput(reportRangeQuerySchema, req.query);
    res.json({ data: await materialConsumption(store, range) });
  });

  return router;
}
