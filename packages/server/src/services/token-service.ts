import type { TokenClaims, IssuedToken } from '../types/token.js';
import type { TokenCodec } from './token-codec.js';
import { type Clock, systemClock, toNumericDate, fromNumericDate } from '../time/clock.js';
import { generateTokenId } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import {
  TOKEN_KIND_ACCESS,
  TOKEN_KIND_REFRESH,
  DEFAULT_ACCESS_TOKEN_TTL,
  DEFAULT_REFRESH_TOKEN_TTL,
} from '../config/constants.js';

export interface TokenServiceOptions {
  codec: TokenCodec;
  clock?: Clock;
  accessTokenTtl?: number;
  refreshTokenTtl?: number;
}

export interface PairGenerationOptions {
  subjectId: string;
  scopes: string[];
  tokenFamilyId: string;
}

/**
 * A freshly signed pair, not yet recorded anywhere
 */
export interface GeneratedPair {
  accessToken: IssuedToken;
  accessClaims: TokenClaims;
  refreshToken: IssuedToken;
  refreshClaims: TokenClaims;
  refreshTokenHash: string;
  refreshExpiresAt: Date;
}

/**
 * Builds and signs access/refresh pairs sharing one family id
 */
export class TokenService {
  readonly accessTokenTtl: number;
  readonly refreshTokenTtl: number;
  private readonly codec: TokenCodec;
  private readonly clock: Clock;

  constructor(options: TokenServiceOptions) {
    this.codec = options.codec;
    this.clock = options.clock ?? systemClock;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.refreshTokenTtl = options.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL;
  }

  /**
   * Generate a complete token pair
   */
  async generatePair(options: PairGenerationOptions): Promise<GeneratedPair> {
    const { subjectId, scopes, tokenFamilyId } = options;
    const now = toNumericDate(this.clock.now());

    const accessClaims: TokenClaims = {
      subjectId,
      scopes,
      issuedAt: now,
      expiresAt: now + this.accessTokenTtl,
      tokenFamilyId,
      tokenType: TOKEN_KIND_ACCESS,
      tokenId: generateTokenId(),
    };

    const refreshClaims: TokenClaims = {
      subjectId,
      scopes,
      issuedAt: now,
      expiresAt: now + this.refreshTokenTtl,
      tokenFamilyId,
      tokenType: TOKEN_KIND_REFRESH,
      tokenId: generateTokenId(),
    };

    const [accessToken, refreshToken] = await Promise.all([
      this.codec.issue(accessClaims),
      this.codec.issue(refreshClaims),
    ]);

    return {
      accessToken,
      accessClaims,
      refreshToken,
      refreshClaims,
      refreshTokenHash: hashToken(refreshToken),
      refreshExpiresAt: fromNumericDate(refreshClaims.expiresAt),
    };
  }
}
