import { config } from '../config.js';
import { logger } from '../middleware/requestLogger.js';
import { hashPassword } from './authService.js';
import type { Store } from './store.js';
import { toPublicUser, type PublicUser } from '../types/auth.js';

type OwnerSeed = NonNullable<typeof config.ownerSeed>;

/**
 * Creates the first owner account from OWNER_* settings when no owner exists
 * yet. Registration is owner-only, so without this there is no way in.
 */
export async function seedOwner(store: Store, seed: OwnerSeed | null = config.ownerSeed): Promise<PublicUser | null> {
  const owners = await store.users.list({ role: 'owner' });
  if (owners.length > 0) {
    logger.debug({ owners: owners.length }, 'Owner account already exists, skipping seed');
    return null;
  }

  if (!seed) {
    logger.warn('No owner account exists and OWNER_USERNAME/OWNER_EMAIL/OWNER_PASSWORD are not set');
    return null;
  }

  const user = await store.users.create({
    username: seed.username,
    email: seed.email.toLowerCase(),
    fullName: seed.fullName,
    passwordHash: await hashPassword(seed.password),
    role: 'owner',
  });

  logger.info({ username: user.username }, 'Seeded owner account');
  return toPublicUser(user);
}
