import type { RevocationEntry } from '../../types/token.js';

/**
 * Storage interface for the access-token blacklist
 *
 * Entries only need to live as long as the tokens they block.
 */
export interface IRevocationListStorage {
  /**
   * Add or extend an entry. A later `expiresAt` wins.
   */
  add(entry: RevocationEntry): Promise<void>;

  /**
   * Check whether any of the keys is listed and not yet expired at `now`
   */
  hasAny(keys: string[], now: Date): Promise<boolean>;

  /**
   * Delete entries that expired before `now`
   */
  deleteExpired(now: Date): Promise<number>;
}
