import { z } from 'zod';

/** Every role an account can hold */
export const USER_ROLES = ['owner', 'caster', 'filer', 'setter', 'polisher'] as const;

/** Roles that work on production stages */
export const WORKER_ROLES = ['caster', 'filer', 'setter', 'polisher'] as const;

export type UserRole = (typeof USER_ROLES)[number];
export type WorkerRole = (typeof WORKER_ROLES)[number];

/** User row as stored in the users table */
export interface UserRecord {
  id: string;
  username: string;
  email: string;
  fullName: string;
  passwordHash: string;
  role: UserRole;
  isActive: boolean;
  createdAt: string;
}

/** User as returned by the API; never carries the password hash */
export type PublicUser = Omit<UserRecord, 'passwordHash'>;

/** JWT token claims */
export interface JwtPayload {
  sub: string;
  username: string;
  role: UserRole;
}

/** Successful login response */
export interface LoginResponse {
  accessToken: string;
  tokenType: 'bearer';
  user: PublicUser;
}

/** Standard error response body */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}

/** Request body for POST /api/auth/register */
export const registerUserSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().toLowerCase().email().max(100),
  fullName: z.string().trim().min(1).max(100),
  password: z.string().min(6),
  role: z.enum(USER_ROLES),
});

export type RegisterUserRequest = z.infer<typeof registerUserSchema>;

/** Request body for POST /api/auth/login (JSON or form-encoded) */
export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export type LoginRequest = z.infer<typeof loginSchema>;

/** Request body for PUT /api/users/:id */
export const updateUserSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().max(100).optional(),
    fullName: z.string().trim().min(1).max(100).optional(),
    role: z.enum(USER_ROLES).optional(),
    isActive: z.boolean().optional(),
    password: z.string().min(6).optional(),
  })
  .strict();

export type UpdateUserRequest = z.infer<typeof updateUserSchema>;

/** Query string for GET /api/users */
export const listUsersQuerySchema = z.object({
  role: z.enum(USER_ROLES).optional(),
  active: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
});

/** Strips the password hash before a user leaves the service layer */
export function toPublicUser(user: UserRecord): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export function isWorkerRole(role: UserRole): role is WorkerRole {
  return role !== 'owner';
}

// Augment Express Request to include the authenticated user
declare global {
  namespace Express {
    interface Request {
      user?: PublicUser;
    }
  }
}
