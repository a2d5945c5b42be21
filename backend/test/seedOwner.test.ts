import bcrypt from 'bcrypt';
import { describe, expect, it } from 'vitest';
import { seedOwner } from '../src/services/seedOwner.js';
import { MemoryStore } from './support/memoryStore.js';
import { addUser } from './support/fixtures.js';

const seed = {
  username: 'founder',
  email: 'Founder@Example.com',
  password: 'founder-pass',
  fullName: 'Workshop Founder',
};

describe('seedOwner', () => {
  it('creates the first owner from the seed settings', async () => {
    const store = new MemoryStore();

    const owner = await seedOwner(store, seed);

    expect(owner).toMatchObject({ username: 'founder', email: 'founder@example.com', role: 'owner' });
    const stored = await store.users.findByUsername('founder');
    expect(await bcrypt.compare('founder-pass', stored?.passwordHash ?? '')).toBe(true);
  });

  it('does nothing once an owner exists', async () => {
    const store = new MemoryStore();
    await addUser(store, 'owner');

    expect(await seedOwner(store, seed)).toBeNull();
    expect(await store.users.findByUsername('founder')).toBeNull();
  });

  it('does nothing without seed settings', async () => {
    const store = new MemoryStore();

    expect(await seedOwner(store, null)).toBeNull();
    expect(await store.users.list()).toEqual([]);
  });
});
