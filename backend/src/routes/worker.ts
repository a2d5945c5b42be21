import { Router } from 'express';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { rbacMiddleware } from '../middleware/rbac.js';
import { parseInput } from '../middleware/validate.js';
import type { Store } from '../services/store.js';
import { completeTask, listTasks } from '../services/taskService.js';
import { WORKER_ROLES } from '../types/auth.js';
import { completeTaskSchema } from '../types/job.js';

/** Worker-facing router: own open tasks and task completion */
export function workerRouter(store: Store): Router {
  const router = Router();

  router.use(authMiddleware(store), rbacMiddleware(WORKER_ROLES));

  router.get('/tasks', async (req, res) => {
    res.json({ data: await listTasks(store, currentUser(req)) });
  });

  router.post('/complete-task', async (req, res) => {
    const input = parseInput(completeTaskSchema, req.body ?? {});
    res.json({ data: await completeTask(store, currentUser(req), input) });
  });

  return router;
}
