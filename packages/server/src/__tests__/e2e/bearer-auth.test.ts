import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import { requireScopes, extractBearerToken } from '../../middleware/bearer-auth.js';
import { authErrorHandler } from '../../middleware/error-handler.js';
import { setupTestContext, bearer, ALICE, type TestContext } from '../test-setup.js';

describe('bearerAuth middleware', () => {
  let ctx: TestContext;
  let app: Hono<AuthEnv>;

  beforeEach(async () => {
    ctx = await setupTestContext();

    app = new Hono<AuthEnv>();
    app.onError(authErrorHandler);
    app.get('/documents', requireScopes({ authenticator: ctx.engine.authenticator, realm: 'documents' }, ['write']), (c) =>
      c.json({ subject: c.get('principal')?.subjectId })
    );
  });

  async function accessToken(scopes?: string[]): Promise<string> {
    const pair = await ctx.engine.grants.passwordGrant({
      identifier: ALICE.identifier,
      secret: ALICE.password,
      scopes,
    });
    return pair.accessToken;
  }

  it('should pass the principal on when the scopes are held', async () => {
    const res = await app.request('/documents', { headers: bearer(await accessToken()) });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ subject: ALICE.subjectId });
  });

  it('should refuse a token without the required scope', async () => {
    const res = await app.request('/documents', { headers: bearer(await accessToken(['read'])) });

    expect(res.status).toBe(403);
    expect(res.headers.get('WWW-Authenticate')).toBe(
      'Bearer realm="documents", error="insufficient_scope", scope="write"'
    );
    expect(await res.json()).toEqual({
      error: 'forbidden',
      error_description: 'Required scopes: write',
      reason: 'insufficient_scope',
    });
  });

  it('should use its realm in challenges', async () => {
    const res = await app.request('/documents');

    expect(res.status).toBe(401);
    expect(res.headers.get('WWW-Authenticate')).toBe('Bearer realm="documents"');
  });

  describe('extractBearerToken', () => {
    it('should read the token case-insensitively', () => {
      expect(extractBearerToken('Bearer abc')).toBe('abc');
      expect(extractBearerToken('bearer  abc ')).toBe('abc');
    });

    it('should refuse other shapes', () => {
      expect(extractBearerToken(undefined)).toBeNull();
      expect(extractBearerToken('Bearer')).toBeNull();
      expect(extractBearerToken('Bearer a b')).toBeNull();
      expect(extractBearerToken('Basic abc')).toBeNull();
    });
  });
});
