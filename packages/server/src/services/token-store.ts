import type { CreateFamilyInput, RefreshRecord, RotationResult } from '../types/token.js';
import type { IRefreshFamilyStorage } from '../storage/interfaces/refresh-family-storage.js';
import { type Clock, systemClock } from '../time/clock.js';
import { constantTimeCompare } from '../crypto/hash.js';
import { TokenError } from '../errors/token-error.js';
import { DEFAULT_CLOCK_SKEW_LEEWAY } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('token-store');

export interface TokenStoreOptions {
  storage: IRefreshFamilyStorage;
  clock?: Clock;
  /**
   * Seconds a family is kept past its expiry, matching the refresh token's
   * verification leeway
   */
  leeway?: number;
}

/**
 * Tracks refresh token families and their single current token
 */
export class TokenStore {
  private readonly storage: IRefreshFamilyStorage;
  private readonly clock: Clock;
  private readonly leeway: number;

  constructor(options: TokenStoreOptions) {
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.leeway = options.leeway ?? DEFAULT_CLOCK_SKEW_LEEWAY;
  }

  /**
   * Record a new family with rotation count 0
   */
  async createFamily(input: CreateFamilyInput): Promise<string> {
    const inserted = await this.storage.insert(input, this.clock.now());
    if (!inserted) {
      throw TokenError.storageConflict(`Token family already exists: ${input.tokenFamilyId}`);
    }

    log.debug('Token family created', {
      tokenFamilyId: input.tokenFamilyId,
      subjectId: input.subjectId,
    });

    return input.tokenFamilyId;
  }

  /**
   * Swap the family's current refresh token hash
   *
   * A presented hash that is not the current one means a superseded token
   * came back: the family is revoked on the spot.
   */
  async rotate(
    tokenFamilyId: string,
    oldHash: string,
    newHash: string,
    expiresAt: Date
  ): Promise<RotationResult> {
    const record = await this.storage.findByFamilyId(tokenFamilyId);

    if (!record) {
      return { status: 'not_found' };
    }

    if (record.revoked) {
      return { status: 'revoked', record };
    }

    if (!constantTimeCompare(record.currentRefreshTokenHash, oldHash)) {
      const now = this.clock.now();
      await this.storage.markRevoked(tokenFamilyId, now);

      log.warn('Refresh token reuse detected, family revoked', {
        tokenFamilyId,
        subjectId: record.subjectId,
        rotationCount: record.rotationCount,
      });

      return { status: 'reuse_detected', record: { ...record, revoked: true, revokedAt: now } };
    }

    const updated = await this.storage.compareAndSwapHash(
      tokenFamilyId,
      { hash: oldHash, rotationCount: record.rotationCount },
      { hash: newHash, updatedAt: this.clock.now(), expiresAt }
    );

    if (!updated) {
      log.info('Refresh rotation lost a compare-and-swap', { tokenFamilyId });
      return { status: 'conflict' };
    }

    return { status: 'rotated', record: updated };
  }

  /**
   * Revoke a family. Idempotent; returns true if this call changed it.
   */
  async revoke(tokenFamilyId: string): Promise<boolean> {
    const changed = await this.storage.markRevoked(tokenFamilyId, this.clock.now());

    if (changed) {
      log.info('Token family revoked', { tokenFamilyId });
    }

    return changed;
  }

  /**
   * Revoke every family of a subject. Returns the ids this call revoked.
   */
  async revokeBySubject(subjectId: string): Promise<string[]> {
    const familyIds = await this.storage.markRevokedBySubject(subjectId, this.clock.now());

    if (familyIds.length > 0) {
      log.info('Token families revoked for subject', { subjectId, count: familyIds.length });
    }

    return familyIds;
  }

  /**
   * Unknown families count as revoked
   */
  async isRevoked(tokenFamilyId: string): Promise<boolean> {
    const record = await this.storage.findByFamilyId(tokenFamilyId);
    return record === null || record.revoked;
  }

  async find(tokenFamilyId: string): Promise<RefreshRecord | null> {
    return this.storage.findByFamilyId(tokenFamilyId);
  }

  /**
   * Delete families whose refresh token can no longer verify
   */
  async deleteExpired(): Promise<number> {
    const cutoff = new Date(this.clock.now().getTime() - this.leeway * 1000);
    return this.storage.deleteExpired(cutoff);
  }
}
