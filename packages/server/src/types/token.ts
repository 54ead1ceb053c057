import type { TokenKind } from '@tokenline/shared';

/**
 * Decoded, validated token claims
 */
export interface TokenClaims {
  subjectId: string;
  scopes: string[];
  issuedAt: number; // NumericDate (seconds)
  expiresAt: number; // NumericDate (seconds)
  tokenFamilyId: string;
  tokenType: TokenKind;
  tokenId: string;
}

/**
 * Signed token string (compact JWS)
 */
export type IssuedToken = string;

/**
 * Refresh token family record (stored)
 */
export interface RefreshRecord {
  tokenFamilyId: string;
  currentRefreshTokenHash: string;
  subjectId: string;
  scopes: string[];
  issuedAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  revoked: boolean;
  revokedAt?: Date;
  rotationCount: number;
}

export interface CreateFamilyInput {
  tokenFamilyId: string;
  subjectId: string;
  refreshTokenHash: string;
  scopes: string[];
  expiresAt: Date;
}

/**
 * Outcome of a refresh token rotation
 */
export type RotationResult =
  | { status: 'rotated'; record: RefreshRecord }
  | { status: 'reuse_detected'; record: RefreshRecord }
  | { status: 'revoked'; record: RefreshRecord }
  | { status: 'not_found' }
  | { status: 'conflict' };

/**
 * Blacklist entry for access-token revocation
 */
export interface RevocationEntry {
  key: string;
  kind: 'family' | 'token';
  expiresAt: Date;
  revokedAt: Date;
}

/**
 * Access/refresh pair handed back by the grant engine
 */
export interface TokenPair {
  accessToken: IssuedToken;
  refreshToken: IssuedToken;
  tokenFamilyId: string;
  expiresIn: number;
  refreshExpiresIn: number;
  scopes: string[];
}
