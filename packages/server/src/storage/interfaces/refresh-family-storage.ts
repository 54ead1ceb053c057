import type { CreateFamilyInput, RefreshRecord } from '../../types/token.js';

/**
 * Expected state for a compare-and-swap on a family's current hash
 */
export interface FamilySnapshot {
  hash: string;
  rotationCount: number;
}

/**
 * Replacement written by a successful compare-and-swap
 */
export interface FamilyRotation {
  hash: string;
  updatedAt: Date;
  expiresAt: Date;
}

/**
 * Persistence interface for refresh token families
 *
 * Backends must make `compareAndSwapHash` atomic (a conditional UPDATE,
 * a row lock, a WATCH/MULTI transaction): of several writers holding the
 * same snapshot exactly one may succeed.
 */
export interface IRefreshFamilyStorage {
  /**
   * Insert a new family. Returns false if the id is already taken.
   */
  insert(input: CreateFamilyInput, issuedAt: Date): Promise<boolean>;

  /**
   * Find a family by id
   */
  findByFamilyId(tokenFamilyId: string): Promise<RefreshRecord | null>;

  /**
   * Replace the current hash and increment the rotation count if, and
   * only if, the stored hash and rotation count still match `expected`
   * and the family is not revoked
   *
   * Returns the updated record, or null when the swap did not happen.
   */
  compareAndSwapHash(
    tokenFamilyId: string,
    expected: FamilySnapshot,
    next: FamilyRotation
  ): Promise<RefreshRecord | null>;

  /**
   * Mark a family revoked. Returns false if it was unknown or already revoked.
   */
  markRevoked(tokenFamilyId: string, revokedAt: Date): Promise<boolean>;

  /**
   * Revoke every live family of a subject. Returns the ids that changed.
   */
  markRevokedBySubject(subjectId: string, revokedAt: Date): Promise<string[]>;

  /**
   * Delete families whose refresh lifetime ended before `cutoff`
   */
  deleteExpired(cutoff: Date): Promise<number>;
}
