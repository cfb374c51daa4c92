/**
 * HTTP surface: health, request ids, bearer auth and the tRPC mount.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { SignJWT } from 'jose';
import { createApp } from '../../src/server';
import { verifyActor } from '../../src/trpc';
import { CHILD, createTestEconomy, type TestEconomy } from '../mocks/factories';

const auth = { jwtSecret: 'test-secret', issuer: 'household-accounts' };

async function tokenFor(claims: Record<string, unknown>, secret = auth.jwtSecret, issuer = auth.issuer): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuer(issuer)
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(new TextEncoder().encode(secret));
}

describe('verifyActor', () => {
  it('accepts a signed child token', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'child' });
    expect(await verifyActor(token, auth)).toEqual({ userId: CHILD, role: 'child' });
  });

  it('rejects a token signed with another secret', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'child' }, 'other-secret');
    expect(await verifyActor(token, auth)).toBeNull();
  });

  it('rejects a token from another issuer', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'child' }, auth.jwtSecret, 'someone-else');
    expect(await verifyActor(token, auth)).toBeNull();
  });

  it('rejects an unknown role', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'admin' });
    expect(await verifyActor(token, auth)).toBeNull();
  });

  it('rejects everything when no secret is configured', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'child' });
    expect(await verifyActor(token, { ...auth, jwtSecret: '' })).toBeNull();
  });
});

describe('createApp', () => {
  let economy: TestEconomy;
  let connected: boolean;

  function app() {
    return createApp({
      economy,
      auth,
      healthCheck: async () => ({ connected, latencyMs: 3 }),
    });
  }

  beforeEach(() => {
    economy = createTestEconomy();
    connected = true;
  });

  it('reports a healthy database', async () => {
    const res = await app().request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', database: { connected: true, latencyMs: 3 } });
  });

  it('reports 503 when the database is unreachable', async () => {
    connected = false;

    const res = await app().request('/health');

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'unhealthy' });
  });

  it('echoes a client request id', async () => {
    const res = await app().request('/health', { headers: { 'X-Request-Id': 'req_fixed' } });

    expect(res.headers.get('X-Request-Id')).toBe('req_fixed');
  });

  it('replaces a malformed client request id', async () => {
    const res = await app().request('/health', { headers: { 'X-Request-Id': 'has spaces' } });

    expect(res.headers.get('X-Request-Id')).toMatch(/^req_[0-9a-f-]{36}$/);
  });

  it('returns JSON for unknown routes', async () => {
    const res = await app().request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Route not found', statusCode: 404 } });
  });

  it('serves tRPC queries for a bearer token', async () => {
    const token = await tokenFor({ sub: CHILD, role: 'child' });
    const input = encodeURIComponent(JSON.stringify({}));

    const res = await app().request(`/trpc/ledger.getBalance?input=${input}`, {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ result: { data: { userId: CHILD, currentXP: 0 } } });
  });

  it('answers 401 without a token', async () => {
    const input = encodeURIComponent(JSON.stringify({}));

    const res = await app().request(`/trpc/ledger.getBalance?input=${input}`);

    expect(res.status).toBe(401);
  });
});
