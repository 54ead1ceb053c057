import type { TokenClaims } from '../types/token.js';
import type { IRevocationListStorage } from '../storage/interfaces/revocation-list-storage.js';
import { type Clock, systemClock, fromNumericDate } from '../time/clock.js';
import { DEFAULT_ACCESS_TOKEN_TTL, DEFAULT_CLOCK_SKEW_LEEWAY } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('revocation-policy');

export interface RevocationPolicyOptions {
  /**
   * Check the blacklist on every access token. Trades store-free
   * verification for immediate revocation.
   */
  enabled: boolean;
  storage: IRevocationListStorage;
  clock?: Clock;
  accessTokenTtl?: number;
  leeway?: number;
}

export function familyKey(tokenFamilyId: string): string {
  return `family:${tokenFamilyId}`;
}

export function tokenKey(tokenId: string): string {
  return `token:${tokenId}`;
}

/**
 * Optional access-token blacklist
 *
 * Entries live only as long as the tokens they block could still pass
 * verification, so the list stays bounded.
 */
export class RevocationPolicy {
  readonly enabled: boolean;
  private readonly storage: IRevocationListStorage;
  private readonly clock: Clock;
  private readonly accessTokenTtl: number;
  private readonly leeway: number;

  constructor(options: RevocationPolicyOptions) {
    this.enabled = options.enabled;
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.leeway = options.leeway ?? DEFAULT_CLOCK_SKEW_LEEWAY;
  }

  /**
   * Block every access token of a family issued so far. The newest one
   * can live one access lifetime from now.
   */
  async revokeFamily(tokenFamilyId: string): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const now = this.clock.now();
    await this.storage.add({
      key: familyKey(tokenFamilyId),
      kind: 'family',
      revokedAt: now,
      expiresAt: this.familyHorizon(now),
    });

    log.debug('Family blacklisted', { tokenFamilyId });
  }

  /**
   * Block a single token until it would have expired anyway
   *
   * Returns false when the policy is off or the token is already past
   * its expiry.
   */
  async revokeToken(claims: TokenClaims): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }

    const now = this.clock.now();
    const expiresAt = new Date(fromNumericDate(claims.expiresAt).getTime() + this.leeway * 1000);

    if (expiresAt <= now) {
      return false;
    }

    await this.storage.add({
      key: tokenKey(claims.tokenId),
      kind: 'token',
      revokedAt: now,
      expiresAt,
    });

    log.debug('Token blacklisted', { tokenId: claims.tokenId, tokenFamilyId: claims.tokenFamilyId });
    return true;
  }

  async isRevoked(claims: TokenClaims): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }

    return this.storage.hasAny(
      [tokenKey(claims.tokenId), familyKey(claims.tokenFamilyId)],
      this.clock.now()
    );
  }

  private familyHorizon(now: Date): Date {
    return new Date(now.getTime() + (this.accessTokenTtl + this.leeway) * 1000);
  }

  async deleteExpired(): Promise<number> {
    return this.storage.deleteExpired(this.clock.now());
  }
}
