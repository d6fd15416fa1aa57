import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createAuthMiddleware } from '../../src/middleware/auth.js';

function buildApp(token: string | null) {
  const app = express();
  app.use(createAuthMiddleware(token));
  app.get('/test', (_req, res) => {
    res.json({ ok: true });
  });
  return app;
}

describe('auth middleware', () => {
  const TOKEN = 'test-access-token';

  it('lets every request through when no token is configured', async () => {
    const res = await request(buildApp(null)).get('/test');
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it('allows request with valid Bearer token', async () => {
    const res = await request(buildApp(TOKEN))
      .get('/test')
      .set('Authorization', `Bearer ${TOKEN}`);
    expect(res.status).toBe(200);
  });

  it('rejects request with no Authorization header', async () => {
    const res = await request(buildApp(TOKEN)).get('/test');
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Authorization header is required');
  });

  it('rejects request with wrong token', async () => {
    const res = await request(buildApp(TOKEN))
      .get('/test')
      .set('Authorization', 'Bearer wrong-token');
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid token');
  });

  it('rejects request with non-Bearer scheme', async () => {
    const res = await request(buildApp(TOKEN))
      .get('/test')
      .set('Authorization', `Basic ${TOKEN}`);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Invalid authorization scheme; use Bearer');
  });
});
