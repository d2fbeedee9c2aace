import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { users } from '../../../src/db/schema.js';
import { redactHeaders } from '../../../src/api/middleware/request-log.js';
import { createTestApp } from '../../helpers/app.js';

const ROUTES: Array<{ method: 'GET' | 'POST'; path: string; body?: unknown }> = [
  { method: 'POST', path: '/api/users', body: { user_id: 1, name: 'Ada' } },
  { method: 'GET', path: '/api/users/1' },
  { method: 'POST', path: '/api/ais', body: { content_id: 1 } },
  { method: 'GET', path: '/api/ais/content/1' },
  { method: 'GET', path: '/api/unknown' },
];

function request(route: (typeof ROUTES)[number], headers: Record<string, string>): RequestInit {
  return {
    method: route.method,
    headers: { 'Content-Type': 'application/json', ...headers },
    ...(route.body === undefined ? {} : { body: JSON.stringify(route.body) }),
  };
}

describe('API key gate', () => {
  let ctx: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(() => {
    ctx.handle.close();
  });

  for (const route of ROUTES) {
    it(`rejects ${route.method} ${route.path} without X-API-KEY`, async () => {
      const res = await ctx.app.request(route.path, request(route, {}));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'No X-API-KEY' });
    });

    it(`rejects ${route.method} ${route.path} with a wrong X-API-KEY`, async () => {
      const res = await ctx.app.request(route.path, request(route, { 'X-API-KEY': 'wrong-secret' }));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Invalid X-API-KEY' });
    });
  }

  it('rejects before any handler runs, even for a valid payload', async () => {
    await ctx.app.request('/api/users', request(ROUTES[0], { 'X-API-KEY': 'wrong-secret' }));
    await ctx.app.request('/api/ais', request(ROUTES[2], {}));

    expect(ctx.db.select().from(users).all()).toHaveLength(0);
    expect(ctx.contentFetch).not.toHaveBeenCalled();
    expect(ctx.generate).not.toHaveBeenCalled();
  });

  it('serves the documentation route without a key', async () => {
    const res = await ctx.app.request('/docs');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      openapi: '3.0.3',
      info: { title: 'Persona Profiles API' },
    });
  });

  it('rejects an empty key when the server has no key configured', async () => {
    const open = createTestApp({ apiKey: '' });

    const res = await open.app.request('/api/users/1', { headers: { 'X-API-KEY': '' } });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: 'Invalid X-API-KEY' });
    open.handle.close();
  });
});

describe('redactHeaders', () => {
  it('masks credential headers and keeps the rest', () => {
    const headers = new Headers({
      'X-API-KEY': 'test-secret',
      'Authorization': 'Bearer test-token',
      'Content-Type': 'application/json',
      'X-Correlation-ID': 'corr-1',
    });

    expect(redactHeaders(headers)).toEqual({
      'x-api-key': '[REDACTED]',
      'authorization': '[REDACTED]',
      'content-type': 'application/json',
      'x-correlation-id': 'corr-1',
    });
  });
});
