import { hashPassword } from '../../src/services/authService.js';
import type { Store } from '../../src/services/store.js';
import { toPublicUser, type PublicUser, type UserRole } from '../../src/types/auth.js';
import type { TransactionRecord } from '../../src/types/job.js';

/** Creates an account directly in the store; hashes the password only when one is given */
export async function addUser(
  store: Store,
  role: UserRole,
  username: string = role,
  password?: string,
): Promise<PublicUser> {
  const user = await store.users.create({
    username,
    email: `${username}@example.com`,
    fullName: `${username[0].toUpperCase()}${username.slice(1)} Smith`,
    passwordHash: password ? await hashPassword(password) : 'not-a-bcrypt-hash',
    role,
  });
  return toPublicUser(user);
}

export interface Workshop {
  owner: PublicUser;
  caster: PublicUser;
  filer: PublicUser;
  setter: PublicUser;
  polisher: PublicUser;
}

/** One owner and one worker per stage */
export async function addWorkshop(store: Store): Promise<Workshop> {
  return {
    owner: await addUser(store, 'owner'),
    caster: await addUser(store, 'caster'),
    filer: await addUser(store, 'filer'),
    setter: await addUser(store, 'setter'),
    polisher: await addUser(store, 'polisher'),
  };
}

export function makeTransaction(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    id: 'txn-1',
    jobId: 'job-1',
    workerId: 'worker-1',
    stage: 'casting',
    issuedWeight: 100,
    returnedWeight: null,
    loss: null,
    lossPercentage: null,
    issuedAt: '2026-01-01T00:00:00.000Z',
    returnedAt: null,
    status: 'in_progress',
    notes: null,
    ...overrides,
  };
}
