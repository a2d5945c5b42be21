import { Router } from 'express';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { rbacMiddleware } from '../middleware/rbac.js';
import { idParamsSchema, parseInput } from '../middleware/validate.js';
import type { Store } from '../services/store.js';
import { deleteUser, getUser, listUsers, updateUser } from '../services/userService.js';
import { listUsersQuerySchema, updateUserSchema } from '../types/auth.js';

/** User administration router; every route is owner-only */
export function usersRouter(store: Store): Router {
  const router = Router();

  router.use(authMiddleware(store), rbacMiddleware(['owner']));

  router.get('/', async (req, res) => {
    const query = parseInput(listUsersQuerySchema, req.query);
    res.json({ data: await listUsers(store, { role: query.role, isActive: query.active }) });
  });

  router.get('/:id', async (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    res.json({ data: await getUser(store, id) });
  });

  router.put('/:id', async (req, res) => {
    const input = parseInput(updateUserSchema, req.body ?? {});
    const { id } = parseInput(idParamsSchema, req.params);
    res.json({ data: await updateUser(store, currentUser(req), id, input) });
  });

  router.delete('/:id', async (req, res) => {
    const { id } = parseInput(idParamsSchema, req.params);
    await deleteUser(store, currentUser(req), id);
    res.json({ message: 'User deleted' });
  });

  return router;
}
