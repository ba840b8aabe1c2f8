import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import { createPool } from '../../db/pool.js';
import { createApp } from '../app.js';
import { createAuthComponents, type AuthComponents } from '../../container.js';
import { migrate } from '../../db/migrate.js';
import { testAuthConfig } from '../../../testing/fixtures.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('Auth API (postgres store)', () => {
  const databaseUrl = process.env.DATABASE_URL ?? '';
  let components: AuthComponents;
  let app: express.Express;
  const uniqueIdentity = (label: string) =>
    `vitest-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}@example.com`;

  beforeAll(async () => {
    const pool = createPool(databaseUrl);
    try {
      await migrate(pool);
    } finally {
      await pool.end();
    }

    components = createAuthComponents(testAuthConfig(), { kind: 'postgres', databaseUrl });
    app = createApp(components, { apiPerMinute: 1000, loginPerMinute: 100 });
  });

  afterEach(async () => {
    const pool = createPool(databaseUrl);
    try {
      await pool.query("DELETE FROM users WHERE identity LIKE 'vitest-%@example.com'");
    } finally {
      await pool.end();
    }
  });

  afterAll(async () => {
    await components.close();
  });

  it('should register, login, authenticate and logout', async () => {
    const identity = uniqueIdentity('flow');

    const registerResponse = await request(app)
      .post('/api/auth/register')
      .send({ identity, password: 'Secr3t!' });
    expect(registerResponse.status).toBe(201);

    const loginResponse = await request(app)
      .post('/api/auth/login')
      .send({ identity, password: 'Secr3t!' });
    expect(loginResponse.status).toBe(200);
    const token: string = loginResponse.body.token;

    const meResponse = await request(app)
      .get('/api/auth/me')
      .set('Authorization', `Bearer ${token}`);
    expect(meResponse.body).toEqual({ userId: registerResponse.body.userId, identity });

    await request(app).post('/api/auth/logout').set('Authorization', `Bearer ${token}`);

    const revoked = await request(app)
      .get('/api/auth/me')
      .set('Authorization', `Bearer ${token}`);
    expect(revoked.status).toBe(401);
    expect(revoked.body).toHaveProperty('code', 'TOKEN_REVOKED');
  });

  it('should reject a duplicate identity', async () => {
    const identity = uniqueIdentity('duplicate');
    await request(app).post('/api/auth/register').send({ identity, password: 'Secr3t!' });

    const response = await request(app)
      .post('/api/auth/register')
      .send({ identity: identity.toUpperCase(), password: 'Secr3t!' });

    expect(response.status).toBe(409);
    expect(response.body).toHaveProperty('code', 'DUPLICATE_IDENTITY');
  });

  it('should report the store healthy', async () => {
    const response = await request(app).get('/healthz');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });
});
