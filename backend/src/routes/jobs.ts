import { Router } from 'express';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { rbacMiddleware } from '../middleware/rbac.js';
import { idParamsSchema, parseInput } from '../middleware/validate.js';
import {
  assignJob,
  createJob,
  deleteJob,
  getJob,
  listJobs,
  updateJob,
} from '../services/jobService.js';
import type { Store } from '../services/store.js';
import { USER_ROLES } from '../types/auth.js';
import {
  assignJobSchema,
  createJobSchema,
  listJobsQuerySchema,
  updateJobSchema,
} from '../types/job.js';

export function jobsRouter(store: Store): Router {
  const router = Router();

  // All routes require authentication
  router.use(authMiddleware(store));

  // ── GET /api/jobs ─────────────────────────────────────────────
  router.get('/', rbacMiddleware(USER_ROLES), async (req, res) => {
    const query = parseInput(listJobsQuerySchema, req.query);
    const jobs = await listJobs(store, currentUser(req), query);
    res.json({ data: jobs, total: jobs.length });
  });

  // ── GET /api/jobs/:id ─────────────────────────────────────────
  router.get('/:id', rbacMiddleware(USER_ROLES), async (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    res.json({ data: await getJob(store, currentUser(req), id) });
  });

  // ── POST /api/jobs ────────────────────────────────────────────
  router.post('/', rbacMiddleware(['owner']), async (req, res) => {
    const input = parseInput(createJobSchema, req.body ?? {});
    const job = await createJob(store, currentUser(req), input);
    res.status(201).json({ data: job });
  });

  // ── PUT /api/jobs/:id ─────────────────────────────────────────
  router.put('/:id', rbacMiddleware(['owner']), async (req, res) => {
    const input = parseInput(updateJobSchema, req.body ?? {});
    const { id } = parseInput(idParamsSchema, req.params);
    res.json({ data: await updateJob(store, currentUser(req), id, input) });
  });

  // ── POST /api/jobs/:id/assign ─────────────────────────────────
  router.post('/:id/assign', rbacMiddleware(['owner']), async (req, res) => {
    const input = parseInput(assignJobSchema, req.body ?? {});
    const { id } = parseInput(idParamsSchema, req.params);
    const result = await assignJob(store, currentUser(req), id, input);
    res.status(201).json({ data: result });
  });

  // ── DELETE /api/jobs/:id ──────────────────────────────────────
  router.delete('/:id', rbacMiddleware(['owner']), async (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    await deleteJob(store, currentUser(req), id);
    res.json({ message: 'Job deleted' });
  });

  return router;
}
