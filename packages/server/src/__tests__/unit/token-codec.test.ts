import { describe, it, expect } from 'vitest';
import { TokenCodec } from '../../services/token-codec.js';
import { KeyRing, generateEcKeyPair, getJwtHeader } from '../../crypto/jwt.js';
import { ManualClock } from '../../time/clock.js';
import type { TokenClaims } from '../../types/token.js';
import {
  TEST_SECRET,
  OTHER_SECRET,
  TEST_START,
  TEST_START_SECONDS,
  LEEWAY,
  hmacRing,
  tamperSignature,
  tamperPayload,
} from '../test-setup.js';

function accessClaims(overrides: Partial<TokenClaims> = {}): TokenClaims {
  return {
    subjectId: 'user-1',
    scopes: ['read', 'write'],
    issuedAt: TEST_START_SECONDS,
    expiresAt: TEST_START_SECONDS + 900,
    tokenFamilyId: 'family-1',
    tokenType: 'access',
    tokenId: 'token-1',
    ...overrides,
  };
}

async function createCodec(options: { clock?: ManualClock; issuer?: string; kid?: string; secret?: string } = {}) {
  const clock = options.clock ?? new ManualClock(TEST_START);
  const keyRing = await hmacRing(options.kid ?? 'primary', options.secret ?? TEST_SECRET);
  return { clock, codec: new TokenCodec({ keyRing, clock, leeway: LEEWAY, issuer: options.issuer }) };
}

describe('TokenCodec', () => {
  describe('issue and verify', () => {
    it('should round-trip claims', async () => {
      const { codec } = await createCodec();
      const claims = accessClaims();

      const token = await codec.issue(claims);

      await expect(codec.verify(token)).resolves.toEqual(claims);
    });

    it('should round-trip refresh claims without scopes', async () => {
      const { codec } = await createCodec();
      const claims = accessClaims({ tokenType: 'refresh', scopes: [], tokenId: 'token-2' });

      const token = await codec.issue(claims);

      await expect(codec.verify(token)).resolves.toEqual(claims);
    });

    it('should produce a compact JWS with the key id in its header', async () => {
      const { codec } = await createCodec();

      const token = await codec.issue(accessClaims());

      expect(token).toMatch(/^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/);
      expect(getJwtHeader(token)).toEqual({ alg: 'HS256', kid: 'primary', typ: 'JWT' });
    });

    it('should write wire claim names', async () => {
      const { codec } = await createCodec({ issuer: 'https://auth.test' });

      const token = await codec.issue(accessClaims());
      const payload: unknown = JSON.parse(Buffer.from(token.split('.')[1], 'base64url').toString('utf8'));

      expect(payload).toEqual({
        iss: 'https://auth.test',
        sub: 'user-1',
        scope: 'read write',
        iat: TEST_START_SECONDS,
        exp: TEST_START_SECONDS + 900,
        fid: 'family-1',
        jti: 'token-1',
        token_type: 'access',
      });
    });

    it('should refuse invalid claims with an encoding error', async () => {
      const { codec } = await createCodec();

      await expect(codec.issue(accessClaims({ subjectId: '' }))).rejects.toMatchObject({ kind: 'encoding_error' });
      await expect(codec.issue(accessClaims({ scopes: ['read', 'read'] }))).rejects.toMatchObject({
        kind: 'encoding_error',
      });
      await expect(codec.issue(accessClaims({ scopes: ['two words'] }))).rejects.toMatchObject({
        kind: 'encoding_error',
      });
      await expect(
        codec.issue(accessClaims({ expiresAt: TEST_START_SECONDS }))
      ).rejects.toMatchObject({ kind: 'encoding_error' });
    });
  });

  describe('tampering', () => {
    it('should reject a modified signature', async () => {
      const { codec } = await createCodec();
      const token = await codec.issue(accessClaims());

      await expect(codec.verify(tamperSignature(token))).rejects.toMatchObject({ kind: 'signature_invalid' });
    });

    it('should reject a change at any position of the signature', async () => {
      const { codec } = await createCodec();
      const token = await codec.issue(accessClaims());
      const [header, payload, signature] = token.split('.');

      for (let i = 0; i < signature.length; i++) {
        const replacement = signature[i] === 'A' ? 'B' : 'A';
        const altered = `${header}.${payload}.${signature.slice(0, i)}${replacement}${signature.slice(i + 1)}`;

        await expect(codec.verify(altered)).rejects.toMatchObject({ kind: 'signature_invalid' });
      }
    });

    it('should reject every other spelling of the final signature character', async () => {
      const { codec } = await createCodec();
      const token = await codec.issue(accessClaims());
      const head = token.slice(0, -1);
      const last = token.slice(-1);
      const alphabet = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

      const accepted: string[] = [];
      for (const char of alphabet) {
        if (char === last) {
          continue;
        }
        const verified = await codec.verify(`${head}${char}`).then(
          () => true,
          () => false
        );
        if (verified) {
          accepted.push(char);
        }
      }

      expect(accepted).toEqual([]);
      await expect(codec.verify(token)).resolves.toEqual(accessClaims());
    });

    it('should reject a modified payload', async () => {
      const { codec } = await createCodec();
      const token = await codec.issue(accessClaims());

      await expect(codec.verify(tamperPayload(token, { sub: 'user-2' }))).rejects.toMatchObject({
        kind: 'signature_invalid',
      });
      await expect(codec.verify(tamperPayload(token, { scope: 'read write admin' }))).rejects.toMatchObject({
        kind: 'signature_invalid',
      });
    });

    it('should reject a token signed with another secret under the same key id', async () => {
      const { codec: forger } = await createCodec({ secret: OTHER_SECRET });
      const { codec } = await createCodec();

      const token = await forger.issue(accessClaims());

      await expect(codec.verify(token)).rejects.toMatchObject({ kind: 'signature_invalid' });
    });

    it('should reject garbage as malformed', async () => {
      const { codec } = await createCodec();

      await expect(codec.verify('not-a-token')).rejects.toMatchObject({ kind: 'malformed' });
      await expect(codec.verify('')).rejects.toMatchObject({ kind: 'malformed' });
    });

    it('should reject an issuer mismatch as malformed', async () => {
      const { codec: issuer } = await createCodec({ issuer: 'https://auth.test' });
      const { codec: verifier } = await createCodec({ issuer: 'https://other.test' });

      const token = await issuer.issue(accessClaims());

      await expect(verifier.verify(token)).rejects.toMatchObject({ kind: 'malformed' });
    });
  });

  describe('expiry', () => {
    it('should accept a token until expiry plus leeway', async () => {
      const { codec, clock } = await createCodec();
      const token = await codec.issue(accessClaims());

      clock.advanceSeconds(900 + LEEWAY - 1);

      await expect(codec.verify(token)).resolves.toMatchObject({ subjectId: 'user-1' });
    });

    it('should reject a token once expiry plus leeway has passed', async () => {
      const { codec, clock } = await createCodec();
      const token = await codec.issue(accessClaims());

      clock.advanceSeconds(900 + LEEWAY);

      await expect(codec.verify(token)).rejects.toMatchObject({ kind: 'expired' });
    });

  });

  describe('key rotation', () => {
    it('should verify tokens signed by a retired key', async () => {
      const clock = new ManualClock(TEST_START);
      const before = new TokenCodec({ keyRing: await hmacRing('2024-01'), clock });
      const token = await before.issue(accessClaims());

      const rotated = await KeyRing.fromConfig({
        activeKid: '2024-02',
        keys: [
          { kid: '2024-02', algorithm: 'HS256', secret: OTHER_SECRET },
          { kid: '2024-01', algorithm: 'HS256', secret: TEST_SECRET },
        ],
      });
      const after = new TokenCodec({ keyRing: rotated, clock });

      await expect(after.verify(token)).resolves.toEqual(accessClaims());
      expect(getJwtHeader(await after.issue(accessClaims()))?.kid).toBe('2024-02');
    });

    it('should reject tokens whose key id is not in the ring', async () => {
      const { codec: retiredOnly } = await createCodec({ kid: 'dropped' });
      const { codec } = await createCodec();

      const token = await retiredOnly.issue(accessClaims());

      await expect(codec.verify(token)).rejects.toMatchObject({ kind: 'signature_invalid' });
    });
  });

  describe('asymmetric keys', () => {
    it('should sign with ES256 and verify with a verify-only copy of the key', async () => {
      const clock = new ManualClock(TEST_START);
      const { publicKey, privateKey } = await generateEcKeyPair();

      const signer = new TokenCodec({
        keyRing: await KeyRing.fromConfig({
          activeKid: 'ec-1',
          keys: [{ kid: 'ec-1', algorithm: 'ES256', publicKey, privateKey }],
        }),
        clock,
      });

      const verifier = new TokenCodec({
        keyRing: await KeyRing.fromConfig({
          activeKid: 'primary',
          keys: [
            { kid: 'primary', algorithm: 'HS256', secret: TEST_SECRET },
            { kid: 'ec-1', algorithm: 'ES256', publicKey },
          ],
        }),
        clock,
      });

      const token = await signer.issue(accessClaims());

      expect(getJwtHeader(token)?.alg).toBe('ES256');
      await expect(verifier.verify(token)).resolves.toEqual(accessClaims());
    });

    it('should refuse a verify-only active key', async () => {
      const { publicKey } = await generateEcKeyPair();

      await expect(
        KeyRing.fromConfig({
          activeKid: 'ec-1',
          keys: [{ kid: 'ec-1', algorithm: 'ES256', publicKey }],
        })
      ).rejects.toThrow('Active signing key "ec-1" cannot sign');
    });
  });
});
