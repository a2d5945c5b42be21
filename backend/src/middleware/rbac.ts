import type { RequestHandler } from 'express';
import { currentUser } from './auth.js';
import { assertRole } from '../services/authService.js';
import type { UserRole } from '../types/auth.js';

/** Returns middleware that restricts access to the specified roles */
export function rbacMiddleware(allowedRoles: readonly UserRole[]): RequestHandler {
  return (req, _res, next) => {
    assertRole(currentUser(req), allowedRoles);
    next();
  };
}
