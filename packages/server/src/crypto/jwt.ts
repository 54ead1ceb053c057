import * as jose from 'jose';
import type { SigningAlgorithm, SigningKeyConfig } from '../config/index.js';

/**
 * JWT signing and verification utilities using jose library
 */

type KeyMaterial = jose.KeyLike | Uint8Array;

/**
 * A signing key ready for use by jose
 */
export interface ResolvedKey {
  kid: string;
  algorithm: SigningAlgorithm;
  verifyKey: KeyMaterial;
  signKey?: KeyMaterial;
}

const textEncoder = new TextEncoder();

/**
 * Import a key ring entry (HMAC secret or PEM pair)
 */
async function importKey(config: SigningKeyConfig): Promise<ResolvedKey> {
  if ('secret' in config) {
    const secret = textEncoder.encode(config.secret);
    return { kid: config.kid, algorithm: config.algorithm, verifyKey: secret, signKey: secret };
  }

  const verifyKey = await jose.importSPKI(config.publicKey, config.algorithm);
  const signKey = config.privateKey
    ? await jose.importPKCS8(config.privateKey, config.algorithm)
    : undefined;

  return { kid: config.kid, algorithm: config.algorithm, verifyKey, signKey };
}

/**
 * Keyed set of signing keys
 *
 * One key signs; every key verifies tokens carrying its `kid`. Retired
 * keys stay in the ring until the tokens they signed have expired.
 */
export class KeyRing {
  private readonly keys: ReadonlyMap<string, ResolvedKey>;
  private readonly active: ResolvedKey;

  private constructor(keys: Map<string, ResolvedKey>, active: ResolvedKey) {
    this.keys = keys;
    this.active = active;
  }

  static async fromConfig(signing: { activeKid: string; keys: readonly SigningKeyConfig[] }): Promise<KeyRing> {
    const resolved = await Promise.all(signing.keys.map((key) => importKey(key)));
    const keys = new Map(resolved.map((key) => [key.kid, key]));

    const active = keys.get(signing.activeKid);
    if (!active) {
      throw new Error(`Active signing key "${signing.activeKid}" is not in the key ring`);
    }
    if (!active.signKey) {
      throw new Error(`Active signing key "${signing.activeKid}" cannot sign`);
    }

    return new KeyRing(keys, active);
  }

  get activeKey(): ResolvedKey {
    return this.active;
  }

  find(kid: string): ResolvedKey | undefined {
    return this.keys.get(kid);
  }
}

/**
 * Sign a JWT with the given key
 */
export async function signJwt(payload: jose.JWTPayload, key: ResolvedKey): Promise<string> {
  if (!key.signKey) {
    throw new Error(`Signing key "${key.kid}" is verify-only`);
  }

  return new jose.SignJWT(payload)
    .setProtectedHeader({
      alg: key.algorithm,
      kid: key.kid,
      typ: 'JWT',
    })
    .sign(key.signKey);
}

/**
 * Verify and decode a JWT
 */
export async function verifyJwt(
  token: string,
  key: ResolvedKey,
  options: {
    currentDate: Date;
    clockTolerance: number;
    issuer?: string;
  }
): Promise<jose.JWTPayload> {
  const verifyOptions: jose.JWTVerifyOptions = {
    algorithms: [key.algorithm],
    clockTolerance: options.clockTolerance,
    currentDate: options.currentDate,
  };

  if (options.issuer) {
    verifyOptions.issuer = options.issuer;
  }

  const { payload } = await jose.jwtVerify(token, key.verifyKey, verifyOptions);

  return payload;
}

/**
 * Whether a segment is the one spelling its bytes encode to
 *
 * Decoders drop the unused low bits of the final character, so several
 * spellings of a signature decode to the same bytes.
 */
export function isCanonicalBase64Url(segment: string): boolean {
  try {
    return jose.base64url.encode(jose.base64url.decode(segment)) === segment;
  } catch {
    return false;
  }
}

/**
 * Get the JWT header without verification
 */
export function getJwtHeader(token: string): jose.ProtectedHeaderParameters | null {
  try {
    return jose.decodeProtectedHeader(token);
  } catch {
    return null;
  }
}

/**
 * Generate a new EC key pair as PEM strings
 */
export async function generateEcKeyPair(): Promise<{ publicKey: string; privateKey: string }> {
  const { publicKey, privateKey } = await jose.generateKeyPair('ES256', {
    extractable: true,
  });

  return {
    publicKey: await jose.exportSPKI(publicKey),
    privateKey: await jose.exportPKCS8(privateKey),
  };
}

export type JoseFailure = 'expired' | 'signature_invalid' | 'claim_invalid' | 'malformed';

/**
 * Classify a jose failure. Returns null for errors jose did not raise.
 */
export function classifyJoseError(error: unknown): JoseFailure | null {
  if (error instanceof jose.errors.JWTExpired) {
    return 'expired';
  }
  if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
    return 'signature_invalid';
  }
  if (error instanceof jose.errors.JWTClaimValidationFailed) {
    return 'claim_invalid';
  }
  if (error instanceof jose.errors.JOSEError) {
    return 'malformed';
  }
  return null;
}
