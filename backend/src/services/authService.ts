import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { config } from '../config.js';
import { ConflictError, PermissionDeniedError, UnauthorizedError } from '../errors.js';
import type { Store } from './store.js';
import {
  toPublicUser,
  type JwtPayload,
  type LoginRequest,
  type LoginResponse,
  type PublicUser,
  type RegisterUserRequest,
  type UserRecord,
  type UserRole,
} from '../types/auth.js';

/** Throws PermissionDenied unless the user holds one of the roles */
export function assertRole(user: PublicUser, roles: readonly UserRole[]): void {
  if (!roles.includes(user.role)) {
    throw new PermissionDeniedError();
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.auth.bcryptRounds);
}

/** Signs an access token whose subject is the user id */
export function signAccessToken(user: Pick<UserRecord, 'id' | 'username' | 'role'>): string {
  const payload: JwtPayload = {
    sub: user.id,
    username: user.username,
    role: user.role,
  };

  return jwt.sign(payload, config.jwt.secret, {
    expiresIn: config.jwt.expiresIn as jwt.SignOptions['expiresIn'],
  });
}

/** Creates a user account. Only owners may register users. */
export async function registerUser(
  store: Store,
  actor: PublicUser,
  input: RegisterUserRequest,
): Promise<PublicUser> {
  assertRole(actor, ['owner']);

  if (await store.users.findByUsername(input.username)) {
    throw new ConflictError('Username already exists');
  }
  if (await store.users.findByEmail(input.email)) {
    throw new ConflictError('Email already exists');
  }

  const user = await store.users.create({
    username: input.username,
    email: input.email.toLowerCase(),
    fullName: input.fullName,
    passwordHash: await hashPassword(input.password),
    role: input.role,
  });

  return toPublicUser(user);
}

/** Exchanges credentials for a signed access token */
export async function login(store: Store, input: LoginRequest): Promise<LoginResponse> {
  const user = await store.users.findByUsername(input.username);

  if (!user || !(await bcrypt.compare(input.password, user.passwordHash))) {
    throw new UnauthorizedError('Incorrect username or password', 'INVALID_CREDENTIALS');
  }
  if (!user.isActive) {
    throw new UnauthorizedError('Account is inactive', 'ACCOUNT_INACTIVE');
  }

  return {
    accessToken: signAccessToken(user),
    tokenType: 'bearer',
    user: toPublicUser(user),
  };
}

/** Verifies a bearer token and resolves it to the current, active user */
export async function authenticate(store: Store, token: string): Promise<PublicUser> {
  let subject: string;
  try {
    const decoded = jwt.verify(token, config.jwt.secret);
    if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
      throw new UnauthorizedError('Invalid token', 'TOKEN_INVALID');
    }
    subject = decoded.sub;
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Token has expired', 'TOKEN_EXPIRED');
    }
    throw new UnauthorizedError('Invalid token', 'TOKEN_INVALID');
  }

  const user = await store.users.findById(subject);
  if (!user) {
    throw new UnauthorizedError('User no longer exists', 'TOKEN_INVALID');
  }
  if (!user.isActive) {
    throw new UnauthorizedError('Account is inactive', 'ACCOUNT_INACTIVE');
  }

  return toPublicUser(user);
}
