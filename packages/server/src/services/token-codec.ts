import { z } from 'zod';
import type * as jose from 'jose';
import type { IssuedToken, TokenClaims } from '../types/token.js';
import { type Clock, systemClock } from '../time/clock.js';
import {
  type KeyRing,
  signJwt,
  verifyJwt,
  getJwtHeader,
  classifyJoseError,
  isCanonicalBase64Url,
} from '../crypto/jwt.js';
import { TokenError } from '../errors/token-error.js';
import {
  TOKEN_KIND_ACCESS,
  TOKEN_KIND_REFRESH,
  DEFAULT_CLOCK_SKEW_LEEWAY,
} from '../config/constants.js';
import { scopeService } from './scope-service.js';

const tokenKindSchema = z.enum([TOKEN_KIND_ACCESS, TOKEN_KIND_REFRESH]);

const numericDate = z.number().int().nonnegative();

/**
 * Claims accepted by `issue`
 */
export const tokenClaimsSchema = z
  .object({
    subjectId: z.string().min(1, 'subjectId is required'),
    scopes: z
      .array(z.string().regex(/^\S+$/, 'Scopes must be non-empty and contain no whitespace'))
      .refine((scopes) => new Set(scopes).size === scopes.length, 'Scopes must be unique'),
    issuedAt: numericDate,
    expiresAt: numericDate,
    tokenFamilyId: z.string().min(1, 'tokenFamilyId is required'),
    tokenType: tokenKindSchema,
    tokenId: z.string().min(1, 'tokenId is required'),
  })
  .refine((claims) => claims.expiresAt > claims.issuedAt, {
    message: 'Token lifetime must be positive',
    path: ['expiresAt'],
  });

/**
 * Payload shape expected on the wire
 */
const tokenPayloadSchema = z
  .object({
    iss: z.string().optional(),
    sub: z.string().min(1),
    scope: z.string(),
    iat: numericDate,
    exp: numericDate,
    fid: z.string().min(1),
    jti: z.string().min(1),
    token_type: tokenKindSchema,
  })
  .refine((payload) => payload.exp > payload.iat, 'exp must be after iat');

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

function payloadToClaims(payload: z.infer<typeof tokenPayloadSchema>): TokenClaims {
  return {
    subjectId: payload.sub,
    scopes: scopeService.parseScopes(payload.scope),
    issuedAt: payload.iat,
    expiresAt: payload.exp,
    tokenFamilyId: payload.fid,
    tokenType: payload.token_type,
    tokenId: payload.jti,
  };
}

export interface TokenCodecOptions {
  keyRing: KeyRing;
  clock?: Clock;
  /**
   * Clock skew tolerance on expiry checks, in seconds
   */
  leeway?: number;
  /**
   * `iss` written into every token and required on verification
   */
  issuer?: string;
}

/**
 * Encodes and verifies signed tokens
 *
 * Verification is stateless: it never consults a store, so access-token
 * checks scale with CPU only.
 */
export class TokenCodec {
  private readonly keyRing: KeyRing;
  private readonly clock: Clock;
  private readonly leeway: number;
  private readonly issuer?: string;

  constructor(options: TokenCodecOptions) {
    this.keyRing = options.keyRing;
    this.clock = options.clock ?? systemClock;
    this.leeway = options.leeway ?? DEFAULT_CLOCK_SKEW_LEEWAY;
    this.issuer = options.issuer;
  }

  /**
   * Sign claims with the active key
   */
  async issue(claims: TokenClaims): Promise<IssuedToken> {
    const parsed = tokenClaimsSchema.safeParse(claims);
    if (!parsed.success) {
      throw TokenError.encoding(`Invalid token claims: ${describeIssues(parsed.error)}`, parsed.error);
    }

    const { data } = parsed;
    const payload: jose.JWTPayload = {
      ...(this.issuer ? { iss: this.issuer } : {}),
      sub: data.subjectId,
      scope: scopeService.formatScopes(data.scopes),
      iat: data.issuedAt,
      exp: data.expiresAt,
      fid: data.tokenFamilyId,
      jti: data.tokenId,
      token_type: data.tokenType,
    };

    return signJwt(payload, this.keyRing.activeKey);
  }

  /**
   * Verify signature and expiry, then return the claims
   */
  async verify(token: string): Promise<TokenClaims> {
    const header = getJwtHeader(token);
    if (!header) {
      throw TokenError.malformed('Token structure cannot be parsed');
    }

    if (typeof header.kid !== 'string' || header.kid.length === 0) {
      throw TokenError.malformed('Token header has no key id');
    }

    const key = this.keyRing.find(header.kid);
    if (!key) {
      throw TokenError.signatureInvalid(`Unknown signing key: ${header.kid}`);
    }

    const segments = token.split('.');
    if (segments.length === 3 && !isCanonicalBase64Url(segments[2])) {
      throw TokenError.signatureInvalid('Signature is not canonically encoded');
    }

    let payload: jose.JWTPayload;
    try {
      payload = await verifyJwt(token, key, {
        currentDate: this.clock.now(),
        clockTolerance: this.leeway,
        issuer: this.issuer,
      });
    } catch (error) {
      switch (classifyJoseError(error)) {
        case 'expired':
          throw TokenError.expired(undefined, error);
        case 'signature_invalid':
          throw TokenError.signatureInvalid(undefined, error);
        case 'claim_invalid':
        case 'malformed':
          throw TokenError.malformed('Token failed validation', error);
        default:
          throw error;
      }
    }

    const parsed = tokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw TokenError.malformed(`Invalid token payload: ${describeIssues(parsed.error)}`, parsed.error);
    }

    return payloadToClaims(parsed.data);
  }
}
