import type { FamilySummary, SessionState } from '@tokenline/shared';
import type { RefreshRecord, TokenClaims, TokenPair } from '../types/token.js';
import type { IIdentityVerifier } from '../storage/interfaces/identity-verifier.js';
import type { TokenCodec } from '../services/token-codec.js';
import type { TokenStore } from '../services/token-store.js';
import type { TokenService, GeneratedPair, PairGenerationOptions } from '../services/token-service.js';
import type { RevocationPolicy } from '../services/revocation-policy.js';
import { scopeService } from '../services/scope-service.js';
import { type Clock, systemClock } from '../time/clock.js';
import { generateFamilyId } from '../crypto/random.js';
import { hashToken } from '../crypto/hash.js';
import { AuthError } from '../errors/auth-error.js';
import { isTokenError } from '../errors/token-error.js';
import {
  REASON_INVALID_CREDENTIALS,
  REASON_INVALID_TOKEN,
  REASON_TOKEN_EXPIRED,
  REASON_TOKEN_FAMILY_REVOKED,
} from '../errors/error-codes.js';
import { TOKEN_KIND_REFRESH, DEFAULT_CLOCK_SKEW_LEEWAY } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';
import { canTransition, deriveSessionState } from './session-state.js';

const log = createLogger('grant-engine');

// One internal retry after a lost compare-and-swap
const MAX_ROTATION_ATTEMPTS = 2;

export interface GrantEngineOptions {
  codec: TokenCodec;
  tokenService: TokenService;
  store: TokenStore;
  identityVerifier: IIdentityVerifier;
  revocationPolicy: RevocationPolicy;
  clock?: Clock;
  /**
   * Clock skew tolerance on family expiry, in seconds
   */
  leeway?: number;
}

export interface PasswordGrantInput {
  identifier: string;
  secret: string;
  scopes?: string[];
}

export interface RefreshGrantInput {
  refreshToken: string;
  scopes?: string[];
}

function toTokenPair(pair: GeneratedPair, scopes: string[], tokenTtl: number, refreshTtl: number): TokenPair {
  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    tokenFamilyId: pair.accessClaims.tokenFamilyId,
    expiresIn: tokenTtl,
    refreshExpiresIn: refreshTtl,
    scopes,
  };
}

function familyRevoked(description = 'Token family has been revoked'): AuthError {
  return AuthError.unauthorized(REASON_TOKEN_FAMILY_REVOKED, description);
}

/**
 * Issues token pairs for logins and refresh token rotations
 *
 * Codec and store failures are translated into `AuthError`s that say no
 * more than a client needs: login failures never reveal whether the
 * identifier exists.
 */
export class GrantEngine {
  private readonly codec: TokenCodec;
  private readonly tokenService: TokenService;
  private readonly store: TokenStore;
  private readonly identityVerifier: IIdentityVerifier;
  private readonly revocationPolicy: RevocationPolicy;
  private readonly clock: Clock;
  private readonly leeway: number;
  private readonly refreshing = new Map<string, number>(); // tokenFamilyId -> in-flight refreshes

  constructor(options: GrantEngineOptions) {
    this.codec = options.codec;
    this.tokenService = options.tokenService;
    this.store = options.store;
    this.identityVerifier = options.identityVerifier;
    this.revocationPolicy = options.revocationPolicy;
    this.clock = options.clock ?? systemClock;
    this.leeway = options.leeway ?? DEFAULT_CLOCK_SKEW_LEEWAY;
  }

  /**
   * Exchange credentials for a new token pair in a new family
   */
  async passwordGrant(input: PasswordGrantInput): Promise<TokenPair> {
    const principal = await this.identityVerifier.verifyCredentials(input.identifier, input.secret);

    if (!principal) {
      log.info('Login rejected');
      throw AuthError.unauthorized(REASON_INVALID_CREDENTIALS, 'Invalid credentials');
    }

    const scopes = scopeService.narrowScopes(principal.scopes, input.scopes);
    const tokenFamilyId = generateFamilyId();

    const pair = await this.issuePair({
      subjectId: principal.subjectId,
      scopes,
      tokenFamilyId,
    });

    try {
      await this.store.createFamily({
        tokenFamilyId,
        subjectId: principal.subjectId,
        refreshTokenHash: pair.refreshTokenHash,
        scopes,
        expiresAt: pair.refreshExpiresAt,
      });
    } catch (error) {
      if (isTokenError(error, 'storage_conflict')) {
        throw AuthError.retryableConflict();
      }
      throw error;
    }

    this.logTransition(tokenFamilyId, 'unauthenticated', 'authenticated');

    return toTokenPair(pair, scopes, this.tokenService.accessTokenTtl, this.tokenService.refreshTokenTtl);
  }

  /**
   * Rotate a refresh token into a new pair of the same family
   *
   * Presenting a superseded refresh token revokes the whole family.
   */
  async refreshGrant(input: RefreshGrantInput): Promise<TokenPair> {
    const claims = await this.verifyRefreshToken(input.refreshToken);
    const { tokenFamilyId } = claims;

    const record = await this.store.find(tokenFamilyId);
    const state = this.deriveState(record);

    if (!record || !canTransition(state, 'refreshing')) {
      if (state === 'revoked') {
        throw familyRevoked();
      }
      throw AuthError.unauthorized(REASON_INVALID_TOKEN, 'Unknown or expired session');
    }

    if (record.subjectId !== claims.subjectId) {
      throw AuthError.unauthorized(REASON_INVALID_TOKEN, 'Refresh token does not match its session');
    }

    let granted = claims.scopes;
    if (this.identityVerifier.findPrincipal) {
      const principal = await this.identityVerifier.findPrincipal(claims.subjectId);
      if (!principal) {
        await this.logout(tokenFamilyId);
        throw familyRevoked('Subject is no longer active');
      }
      granted = granted.filter((scope) => principal.scopes.includes(scope));
    }

    const scopes = scopeService.narrowScopes(granted, input.scopes);

    this.logTransition(tokenFamilyId, state, 'refreshing');
    this.refreshing.set(tokenFamilyId, (this.refreshing.get(tokenFamilyId) ?? 0) + 1);

    try {
      const pair = await this.rotate(claims, hashToken(input.refreshToken), scopes);
      this.logTransition(tokenFamilyId, 'refreshing', 'active');
      return toTokenPair(pair, scopes, this.tokenService.accessTokenTtl, this.tokenService.refreshTokenTtl);
    } finally {
      const remaining = (this.refreshing.get(tokenFamilyId) ?? 1) - 1;
      if (remaining > 0) {
        this.refreshing.set(tokenFamilyId, remaining);
      } else {
        this.refreshing.delete(tokenFamilyId);
      }
    }
  }

  /**
   * Revoke a family. Idempotent.
   */
  async logout(tokenFamilyId: string): Promise<boolean> {
    const changed = await this.store.revoke(tokenFamilyId);
    await this.revocationPolicy.revokeFamily(tokenFamilyId);
    return changed;
  }

  /**
   * Revoke the family a refresh token belongs to
   *
   * Tokens that no longer verify have nothing left to revoke: an expired
   * refresh token outlived its family. Returns whether a family changed.
   */
  async logoutWithRefreshToken(refreshToken: string): Promise<boolean> {
    let claims: TokenClaims;
    try {
      claims = await this.codec.verify(refreshToken);
    } catch (error) {
      if (isTokenError(error)) {
        log.debug('Logout with unusable refresh token', { kind: error.kind });
        return false;
      }
      throw error;
    }

    if (claims.tokenType !== TOKEN_KIND_REFRESH) {
      throw AuthError.invalidRequest('Not a refresh token');
    }

    return this.logout(claims.tokenFamilyId);
  }

  /**
   * Revoke every family of a subject
   */
  async logoutSubject(subjectId: string): Promise<number> {
    const familyIds = await this.store.revokeBySubject(subjectId);
    await Promise.all(familyIds.map((id) => this.revocationPolicy.revokeFamily(id)));
    return familyIds.length;
  }

  /**
   * Blacklist one access token. Only effective when the revocation
   * policy is enabled; returns whether an entry was written.
   */
  async revokeAccessToken(token: string): Promise<boolean> {
    let claims: TokenClaims;
    try {
      claims = await this.codec.verify(token);
    } catch (error) {
      if (isTokenError(error)) {
        return false;
      }
      throw error;
    }

    return this.revocationPolicy.revokeToken(claims);
  }

  /**
   * Current lifecycle state of a family
   */
  async getSessionState(tokenFamilyId: string): Promise<SessionState> {
    const record = await this.store.find(tokenFamilyId);
    return this.stateOf(tokenFamilyId, this.deriveState(record));
  }

  /**
   * Admin view of a family
   */
  async describeFamily(tokenFamilyId: string): Promise<FamilySummary | null> {
    const record = await this.store.find(tokenFamilyId);
    if (!record) {
      return null;
    }

    const state = this.stateOf(tokenFamilyId, this.deriveState(record));

    const summary: FamilySummary = {
      tokenFamilyId: record.tokenFamilyId,
      subjectId: record.subjectId,
      scopes: record.scopes,
      state,
      rotationCount: record.rotationCount,
      issuedAt: record.issuedAt.toISOString(),
      updatedAt: record.updatedAt.toISOString(),
      expiresAt: record.expiresAt.toISOString(),
    };

    if (record.revokedAt) {
      summary.revokedAt = record.revokedAt.toISOString();
    }

    return summary;
  }

  private deriveState(record: RefreshRecord | null): SessionState {
    return deriveSessionState(record, this.clock.now(), this.tokenService.accessTokenTtl, this.leeway);
  }

  private stateOf(tokenFamilyId: string, persisted: SessionState): SessionState {
    if (this.refreshing.has(tokenFamilyId) && canTransition(persisted, 'refreshing')) {
      return 'refreshing';
    }
    return persisted;
  }

  private async verifyRefreshToken(token: string): Promise<TokenClaims> {
    let claims: TokenClaims;
    try {
      claims = await this.codec.verify(token);
    } catch (error) {
      if (isTokenError(error, 'expired')) {
        throw AuthError.unauthorized(REASON_TOKEN_EXPIRED, 'Refresh token has expired', error);
      }
      if (isTokenError(error)) {
        throw AuthError.unauthorized(REASON_INVALID_TOKEN, 'Invalid refresh token', error);
      }
      throw error;
    }

    if (claims.tokenType !== TOKEN_KIND_REFRESH) {
      throw AuthError.unauthorized(REASON_INVALID_TOKEN, 'Not a refresh token');
    }

    return claims;
  }

  private async rotate(claims: TokenClaims, presentedHash: string, scopes: string[]): Promise<GeneratedPair> {
    const { tokenFamilyId } = claims;
    const pair = await this.issuePair({
      subjectId: claims.subjectId,
      scopes,
      tokenFamilyId,
    });

    for (let attempt = 1; attempt <= MAX_ROTATION_ATTEMPTS; attempt++) {
      const result = await this.store.rotate(
        tokenFamilyId,
        presentedHash,
        pair.refreshTokenHash,
        pair.refreshExpiresAt
      );

      switch (result.status) {
        case 'rotated':
          return pair;

        case 'reuse_detected':
          await this.revocationPolicy.revokeFamily(tokenFamilyId);
          this.logTransition(tokenFamilyId, 'refreshing', 'revoked');
          throw familyRevoked();

        case 'revoked':
          throw familyRevoked();

        case 'not_found':
          throw AuthError.unauthorized(REASON_INVALID_TOKEN, 'Unknown or expired session');

        case 'conflict':
          log.debug('Retrying refresh rotation', { tokenFamilyId, attempt });
          break;
      }
    }

    throw AuthError.retryableConflict();
  }

  /**
   * Claims the codec refuses to encode come from principal data, not from
   * the caller
   */
  private async issuePair(options: PairGenerationOptions): Promise<GeneratedPair> {
    try {
      return await this.tokenService.generatePair(options);
    } catch (error) {
      if (isTokenError(error, 'encoding_error')) {
        throw AuthError.serverError('Token could not be issued', error);
      }
      throw error;
    }
  }

  private logTransition(tokenFamilyId: string, from: SessionState, to: SessionState): void {
    if (!canTransition(from, to)) {
      log.warn('Unexpected session transition', { tokenFamilyId, from, to });
      return;
    }
    log.debug('Session transition', { tokenFamilyId, from, to });
  }
}
