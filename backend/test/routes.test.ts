import request from 'supertest';
import type { Express } from 'express';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import { signAccessToken } from '../src/services/authService.js';
import type { PublicUser } from '../src/types/auth.js';
import { MemoryStore } from './support/memoryStore.js';
import { addUser, addWorkshop, type Workshop } from './support/fixtures.js';

function bearer(user: PublicUser): string {
  return `Bearer ${signAccessToken(user)}`;
}

describe('HTTP API', () => {
  let store: MemoryStore;
  let app: Express;
  let shop: Workshop;

  beforeEach(async () => {
    store = new MemoryStore();
    app = createApp(store);
    shop = await addWorkshop(store);
  });

  describe('infrastructure', () => {
    it('reports health from the store', async () => {
      const healthy = await request(app).get('/api/health');
      expect(healthy.status).toBe(200);
      expect(healthy.body).toMatchObject({ status: 'ok', services: { api: 'ok', database: 'ok' } });

      store.healthy = false;
      const degraded = await request(app).get('/api/health');
      expect(degraded.status).toBe(503);
      expect(degraded.body.status).toBe('degraded');
    });

    it('answers unknown routes with a structured 404', async () => {
      const res = await request(app).get('/api/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route GET /api/nope not found' } });
    });

    it('rejects malformed JSON bodies', async () => {
      const res = await request(app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"username": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
    });
  });

  describe('auth', () => {
    it('logs in with form-encoded credentials', async () => {
      await addUser(store, 'caster', 'meera', 'meera-pass');

      const res = await request(app).post('/api/auth/login').type('form').send({ username: 'meera', password: 'meera-pass' });

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ tokenType: 'bearer', user: { username: 'meera', role: 'caster' } });

      const me = await request(app).get('/api/auth/me').set('Authorization', `Bearer ${res.body.data.accessToken}`);
      expect(me.status).toBe(200);
      expect(me.body.data).toMatchObject({ username: 'meera' });
      expect(me.body.data).not.toHaveProperty('passwordHash');
    });

    it('rejects bad credentials with 401', async () => {
      await addUser(store, 'caster', 'meera', 'meera-pass');

      const res = await request(app).post('/api/auth/login').send({ username: 'meera', password: 'nope' });

      expect(res.status).toBe(401);
      expect(res.body.error.code).toBe('INVALID_CREDENTIALS');
    });

    it('requires a token on protected routes', async () => {
      const missing = await request(app).get('/api/jobs');
      expect(missing.status).toBe(401);
      expect(missing.body.error.code).toBe('TOKEN_MISSING');

      const invalid = await request(app).get('/api/jobs').set('Authorization', 'Bearer garbage');
      expect(invalid.status).toBe(401);
      expect(invalid.body.error.code).toBe('TOKEN_INVALID');
    });

    it('lets owners register users and reports duplicates as 409', async () => {
      const body = {
        username: 'devi',
        email: 'Devi@Example.com',
        fullName: 'Devi Nair',
        password: 'devi-pass',
        role: 'polisher',
      };

      const created = await request(app).post('/api/auth/register').set('Authorization', bearer(shop.owner)).send(body);
      expect(created.status).toBe(201);
      expect(created.body.data).toMatchObject({ username: 'devi', email: 'devi@example.com', role: 'polisher' });
      expect(created.body.data).not.toHaveProperty('passwordHash');

      const duplicate = await request(app).post('/api/auth/register').set('Authorization', bearer(shop.owner)).send(body);
      expect(duplicate.status).toBe(409);
      expect(duplicate.body).toEqual({ error: { code: 'CONFLICT', message: 'Username already exists' } });
    });

    it('forbids workers from registering users', async () => {
      const res = await request(app)
        .post('/api/auth/register')
        .set('Authorization', bearer(shop.caster))
        .send({ username: 'x-user', email: 'x@example.com', fullName: 'X', password: 'secret1', role: 'caster' });

      expect(res.status).toBe(403);
      expect(res.body.error.code).toBe('FORBIDDEN');
    });

    it('validates the registration body', async () => {
      const res = await request(app)
        .post('/api/auth/register')
        .set('Authorization', bearer(shop.owner))
        .send({ username: 'kiran', email: 'not-an-email', fullName: 'Kiran', password: 'kiran-pass', role: 'setter' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'email: Invalid email' } });
    });
  });

  describe('users', () => {
    it('is owner-only', async () => {
      const res = await request(app).get('/api/users').set('Authorization', bearer(shop.filer));

      expect(res.status).toBe(403);
    });

    it('lists, updates and deletes users', async () => {
      const list = await request(app).get('/api/users?role=setter').set('Authorization', bearer(shop.owner));
      expect(list.status).toBe(200);
      expect(list.body.data.map((u: PublicUser) => u.username)).toEqual(['setter']);

      const updated = await request(app)
        .put(`/api/users/${shop.setter.id}`)
        .set('Authorization', bearer(shop.owner))
        .send({ isActive: false });
      expect(updated.status).toBe(200);
      expect(updated.body.data.isActive).toBe(false);

      const removed = await request(app).delete(`/api/users/${shop.setter.id}`).set('Authorization', bearer(shop.owner));
      expect(removed.status).toBe(200);

      const gone = await request(app).get(`/api/users/${shop.setter.id}`).set('Authorization', bearer(shop.owner));
      expect(gone.status).toBe(404);
    });
  });

  describe('jobs and tasks', () => {
    async function createRing(): Promise<string> {
      const res = await request(app)
        .post('/api/jobs')
        .set('Authorization', bearer(shop.owner))
        .send({ designNo: 'R-900', itemCategory: 'ring', initialWeight: 100 });
      expect(res.status).toBe(201);
      return res.body.data.id;
    }

    it('rejects a non-positive initial weight', async () => {
      const res = await request(app)
        .post('/api/jobs')
        .set('Authorization', bearer(shop.owner))
        .send({ designNo: 'R-1', itemCategory: 'ring', initialWeight: 0 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('initialWeight: Number must be greater than 0');
    });

    it('rejects a weight the weight columns cannot hold', async () => {
      const res = await request(app)
        .post('/api/jobs')
        .set('Authorization', bearer(shop.owner))
        .send({ designNo: 'R-2', itemCategory: 'ring', initialWeight: 1e8 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('initialWeight: Number must be less than or equal to 9999999.999');
    });

    it('accepts a zero returned weight but not a negative one', async () => {
      const id = await createRing();
      await request(app)
        .post(`/api/jobs/${id}/assign`)
        .set('Authorization', bearer(shop.owner))
        .send({ workerId: shop.caster.id, stage: 'casting' })
        .expect(201);

      const negative = await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.caster))
        .send({ returnedWeight: -0.5 });
      expect(negative.status).toBe(400);
      expect(negative.body.error.message).toBe('returnedWeight: Number must be greater than or equal to 0');

      const zero = await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.caster))
        .send({ returnedWeight: 0 });
      expect(zero.status).toBe(200);
      expect(zero.body.data.transaction).toMatchObject({ returnedWeight: 0, loss: 100, lossPercentage: 100 });
    });

    it('does not accept derived loss fields on update', async () => {
      const id = await createRing();

      const res = await request(app)
        .put(`/api/jobs/${id}`)
        .set('Authorization', bearer(shop.owner))
        .send({ totalLoss: 0 });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe("Unrecognized key(s) in object: 'totalLoss'");
    });

    it('runs casting then filing over HTTP', async () => {
      const id = await createRing();

      const outOfOrder = await request(app)
        .post(`/api/jobs/${id}/assign`)
        .set('Authorization', bearer(shop.owner))
        .send({ workerId: shop.filer.id, stage: 'filing' });
      expect(outOfOrder.status).toBe(400);

      const assigned = await request(app)
        .post(`/api/jobs/${id}/assign`)
        .set('Authorization', bearer(shop.owner))
        .send({ workerId: shop.caster.id, stage: 'casting' });
      expect(assigned.status).toBe(201);
      expect(assigned.body.data.transaction).toMatchObject({ stage: 'casting', issuedWeight: 100 });

      const again = await request(app)
        .post(`/api/jobs/${id}/assign`)
        .set('Authorization', bearer(shop.owner))
        .send({ workerId: shop.caster.id, stage: 'casting' });
      expect(again.status).toBe(409);

      const tasks = await request(app).get('/api/worker/tasks').set('Authorization', bearer(shop.caster));
      expect(tasks.status).toBe(200);
      expect(tasks.body.data).toHaveLength(1);
      expect(tasks.body.data[0]).toMatchObject({ jobId: id, designNo: 'R-900', stage: 'casting' });

      const done = await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.caster))
        .send({ returnedWeight: 95 });
      expect(done.status).toBe(200);
      expect(done.body.data.transaction).toMatchObject({ loss: 5, lossPercentage: 5 });
      expect(done.body.data.job).toMatchObject({ totalLoss: 5, status: 'pending_assignment' });

      const twice = await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.caster))
        .send({ transactionId: assigned.body.data.transaction.id, returnedWeight: 90 });
      expect(twice.status).toBe(409);

      await request(app)
        .post(`/api/jobs/${id}/assign`)
        .set('Authorization', bearer(shop.owner))
        .send({ workerId: shop.filer.id, stage: 'filing' })
        .expect(201);
      await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.filer))
        .send({ returnedWeight: 90 })
        .expect(200);

      const detail = await request(app).get(`/api/jobs/${id}`).set('Authorization', bearer(shop.owner));
      expect(detail.status).toBe(200);
      expect(detail.body.data).toMatchObject({ totalLoss: 10, lossPercentage: 10 });
      expect(detail.body.data.transactions.map((t: { stage: string; loss: number }) => [t.stage, t.loss])).toEqual([
        ['casting', 5],
        ['filing', 5],
      ]);
    });

    it('hides jobs from uninvolved workers', async () => {
      const id = await createRing();

      const res = await request(app).get(`/api/jobs/${id}`).set('Authorization', bearer(shop.polisher));

      expect(res.status).toBe(404);
    });

    it('keeps owners off worker endpoints and workers off job administration', async () => {
      const complete = await request(app)
        .post('/api/worker/complete-task')
        .set('Authorization', bearer(shop.owner))
        .send({ returnedWeight: 1 });
      expect(complete.status).toBe(403);

      const create = await request(app)
        .post('/api/jobs')
        .set('Authorization', bearer(shop.setter))
        .send({ designNo: 'S-1', itemCategory: 'ring', initialWeight: 3 });
      expect(create.status).toBe(403);
    });

    it('cancels and deletes jobs', async () => {
      const id = await createRing();

      const cancelled = await request(app)
        .put(`/api/jobs/${id}`)
        .set('Authorization', bearer(shop.owner))
        .send({ status: 'cancelled' });
      expect(cancelled.status).toBe(200);
      expect(cancelled.body.data.status).toBe('cancelled');

      const listed = await request(app).get('/api/jobs?status=cancelled').set('Authorization', bearer(shop.owner));
      expect(listed.body.data.map((j: { id: string }) => j.id)).toEqual([id]);

      await request(app).delete(`/api/jobs/${id}`).set('Authorization', bearer(shop.owner)).expect(200);
      await request(app).get(`/api/jobs/${id}`).set('Authorization', bearer(shop.owner)).expect(404);
    });
  });

  describe('reports', () => {
    it('serves aggregates to owners only', async () => {
      const summary = await request(app).get('/api/reports/job-summary').set('Authorization', bearer(shop.owner));
      expect(summary.status).toBe(200);
      expect(summary.body.data).toMatchObject({ totalJobs: 0, totalLoss: 0 });

      const performance = await request(app).get('/api/reports/worker-performance').set('Authorization', bearer(shop.owner));
      expect(performance.body.data).toEqual([]);

      const forbidden = await request(app).get('/api/reports/material-consumption').set('Authorization', bearer(shop.caster));
      expect(forbidden.status).toBe(403);
    });

    it('validates the report date range', async () => {
      const res = await request(app)
        .get('/api/reports/material-consumption?from=not-a-date')
        .set('Authorization', bearer(shop.owner));

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('from: Invalid date');
    });
  });
});
