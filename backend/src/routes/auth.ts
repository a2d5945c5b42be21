import { Router } from 'express';
import { authMiddleware, currentUser } from '../middleware/auth.js';
import { rbacMiddleware } from '../middleware/rbac.js';
import { parseInput } from '../middleware/validate.js';
import { login, registerUser } from '../services/authService.js';
import type { Store } from '../services/store.js';
import { loginSchema, registerUserSchema } from '../types/auth.js';

/** Authentication router — login, owner-only registration and current profile */
export function authRouter(store: Store): Router {
  const router = Router();

  router.post('/login', async (req, res) => {
    const credentials = parseInput(loginSchema, req.body ?? {});
    res.json({ data: await login(store, credentials) });
  });

  router.post(
    '/register',
    authMiddleware(store),
    rbacMiddleware(['owner']),
    async (req, res) => {
      const input = parseInput(registerUserSchema, req.body ?? {});
      const user = await registerUser(store, currentUser(req), input);
      res.status(201).json({ data: user });
    },
  );

  router.get('/me', authMiddleware(store), (req, res) => {
    res.json({ data: currentUser(req) });
  });

  return router;
}
