import type { AuthErrorResponse, Principal, TokenPairResponse } from '@tokenline/shared';
import { createTokenEngine, type EngineConfig, type TokenEngine } from '../engine.js';
import { createAuthServer } from '../app.js';
import { MemoryRefreshFamilyStorage } from '../storage/memory/refresh-family-storage.js';
import { MemoryRevocationListStorage } from '../storage/memory/revocation-list-storage.js';
import { MemoryIdentityVerifier } from '../storage/memory/identity-verifier.js';
import { KeyRing } from '../crypto/jwt.js';
import type { ScryptParams } from '../crypto/hash.js';
import { ManualClock, toNumericDate } from '../time/clock.js';
import { setLogLevel } from '../logging/logger.js';

/**
 * Test fixtures and helpers
 */

// Placeholder HMAC secrets (at least 32 bytes)
export const TEST_SECRET = 'test-secret-0123456789abcdef0123456789';
export const OTHER_SECRET = 'test-secret-other-0123456789abcdef01234';

export const TEST_ADMIN_KEY = 'test-admin-key';

// Cheap scrypt cost so tests do not spend their time hashing
export const FAST_SCRYPT: ScryptParams = { N: 1024, r: 8, p: 1 };

export const TEST_START = new Date(Date.UTC(2024, 0, 1));
export const TEST_START_SECONDS = toNumericDate(TEST_START);

export const ACCESS_TTL = 900;
export const REFRESH_TTL = 3600;
export const LEEWAY = 30;

export const ALICE = {
  identifier: 'alice',
  password: 'test-password',
  subjectId: 'user-alice',
  scopes: ['profile', 'read', 'write'],
};

export const BOB = {
  identifier: 'bob',
  password: 'test-password-bob',
  subjectId: 'user-bob',
  scopes: ['read'],
};

// Keep test output clean
setLogLevel('silent');

export function hmacRing(kid: string, secret: string = TEST_SECRET): Promise<KeyRing> {
  return KeyRing.fromConfig({
    activeKid: kid,
    keys: [{ kid, algorithm: 'HS256', secret }],
  });
}

export interface TestEngineOptions {
  blacklist?: boolean;
  issuer?: string;
}

export function testEngineConfig(options: TestEngineOptions = {}): EngineConfig {
  return {
    signing: {
      activeKid: 'primary',
      keys: [{ kid: 'primary', algorithm: 'HS256', secret: TEST_SECRET }],
    },
    tokens: {
      accessTokenTtl: ACCESS_TTL,
      refreshTokenTtl: REFRESH_TTL,
      clockSkewLeeway: LEEWAY,
      issuer: options.issuer,
    },
    revocation: {
      accessTokenBlacklist: options.blacklist ?? false,
    },
    maintenance: {
      gcIntervalMs: 60000,
    },
  };
}

// Shared test context
export interface TestContext {
  engine: TokenEngine;
  clock: ManualClock;
  refreshFamilies: MemoryRefreshFamilyStorage;
  revocationList: MemoryRevocationListStorage;
  identities: MemoryIdentityVerifier;
  alice: Principal;
  bob: Principal;
}

// Setup function for tests
export async function setupTestContext(options: TestEngineOptions = {}): Promise<TestContext> {
  const clock = new ManualClock(TEST_START);
  const refreshFamilies = new MemoryRefreshFamilyStorage();
  const revocationList = new MemoryRevocationListStorage();
  const identities = new MemoryIdentityVerifier(FAST_SCRYPT);

  const [alice, bob] = await Promise.all([
    identities.addIdentity(ALICE),
    identities.addIdentity(BOB),
  ]);

  const engine = await createTokenEngine({
    config: testEngineConfig(options),
    storage: { refreshFamilies, revocationList },
    identityVerifier: identities,
    clock,
  });

  return { engine, clock, refreshFamilies, revocationList, identities, alice, bob };
}

export interface HttpTestContext extends TestContext {
  app: ReturnType<typeof createAuthServer>;
}

export async function setupHttpContext(options: TestEngineOptions = {}): Promise<HttpTestContext> {
  const ctx = await setupTestContext(options);
  const app = createAuthServer({
    engine: ctx.engine,
    adminApiKey: TEST_ADMIN_KEY,
    enableLogging: false,
  });
  return { ...ctx, app };
}

export function jsonRequest(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export function bearer(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/**
 * Replace the last character of the signature segment
 */
export function tamperSignature(token: string): string {
  const last = token.charAt(token.length - 1) === 'A' ? 'B' : 'A';
  return `${token.slice(0, -1)}${last}`;
}

/**
 * Rewrite the payload without re-signing
 */
export function tamperPayload(token: string, changes: Record<string, unknown>): string {
  const [header, payload, signature] = token.split('.');
  const claims: unknown = JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  const rewritten = { ...(typeof claims === 'object' && claims !== null ? claims : {}), ...changes };
  return `${header}.${Buffer.from(JSON.stringify(rewritten)).toString('base64url')}.${signature}`;
}

// Type helpers for test responses
export type TokenResponse = TokenPairResponse;

export type ErrorResponse = AuthErrorResponse;
