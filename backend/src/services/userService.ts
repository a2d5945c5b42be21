import { ConflictError, NotFoundError, ValidationError } from '../errors.js';
import { hashPassword } from './authService.js';
import type { Store, UserChanges, UserFilters } from './store.js';
import { toPublicUser, type PublicUser, type UpdateUserRequest } from '../types/auth.js';

export async function listUsers(store: Store, filters: UserFilters = {}): Promise<PublicUser[]> {
  const users = await store.users.list(filters);
  return users.map(toPublicUser);
}

export async function getUser(store: Store, id: string): Promise<PublicUser> {
  const user = await store.users.findById(id);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return toPublicUser(user);
}

/** Updates profile fields, role, activation or password of an account */
export async function updateUser(
  store: Store,
  actor: PublicUser,
  id: string,
  input: UpdateUserRequest,
): Promise<PublicUser> {
  const { password, ...fields } = input;
  if (Object.values(input).every((value) => value === undefined)) {
    throw new ValidationError('No update data provided');
  }

  // Owners keep at least their own access
  if (id === actor.id && (fields.isActive === false || (fields.role && fields.role !== actor.role))) {
    throw new ValidationError('You cannot deactivate or change the role of your own account');
  }

  const existing = await store.users.findById(id);
  if (!existing) {
    throw new NotFoundError('User not found');
  }

  // Workers keep their role and access while holding an open task
  if (fields.isActive === false || (fields.role && fields.role !== existing.role)) {
    const active = await store.transactions.list({ workerId: id, status: 'in_progress' });
    if (active.length > 0) {
      throw new ConflictError('User has an active task; complete it or cancel its job first');
    }
  }

  if (fields.email && fields.email !== existing.email) {
    const taken = await store.users.findByEmail(fields.email);
    if (taken) {
      throw new ConflictError('Email already exists');
    }
  }

  const changes: UserChanges = { ...fields };
  if (password !== undefined) {
    changes.passwordHash = await hashPassword(password);
  }

  const updated = await store.users.update(id, changes);
  if (!updated) {
    throw new NotFoundError('User not found');
  }
  return toPublicUser(updated);
}

/** Deletes an account; accounts with production history must be deactivated instead */
export async function deleteUser(store: Store, actor: PublicUser, id: string): Promise<void> {
  if (id === actor.id) {
    throw new ValidationError('You cannot delete your own account');
  }

  const deleted = await store.users.delete(id);
  if (!deleted) {
    throw new NotFoundError('User not found');
  }
}
