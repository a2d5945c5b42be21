import type { Request, RequestHandler } from 'express';
import { UnauthorizedError } from '../errors.js';
import { authenticate } from '../services/authService.js';
import type { Store } from '../services/store.js';
import type { PublicUser } from '../types/auth.js';

/** Validates the bearer token and attaches the resolved user to req.user */
export function authMiddleware(store: Store): RequestHandler {
  return async (req, _res, next) => {
    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
      throw new UnauthorizedError('Authorization header required', 'TOKEN_MISSING');
    }

    req.user = await authenticate(store, authHeader.slice(7));
    next();
  };
}

/** The authenticated user of a request that passed authMiddleware */
export function currentUser(req: Request): PublicUser {
  if (!req.user) {
    throw new UnauthorizedError('Authentication required', 'TOKEN_MISSING');
  }
  return req.user;
}
