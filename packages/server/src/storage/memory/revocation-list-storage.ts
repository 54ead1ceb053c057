import type { RevocationEntry } from '../../types/token.js';
import type { IRevocationListStorage } from '../interfaces/revocation-list-storage.js';

/**
 * In-memory access-token blacklist
 */
export class MemoryRevocationListStorage implements IRevocationListStorage {
  private entries = new Map<string, RevocationEntry>();

  async add(entry: RevocationEntry): Promise<void> {
    const existing = this.entries.get(entry.key);
    if (existing && existing.expiresAt >= entry.expiresAt) {
      return;
    }
    this.entries.set(entry.key, { ...entry });
  }

  async hasAny(keys: string[], now: Date): Promise<boolean> {
    return keys.some((key) => {
      const entry = this.entries.get(key);
      return entry !== undefined && entry.expiresAt > now;
    });
  }

  async deleteExpired(now: Date): Promise<number> {
    let deleted = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        deleted++;
      }
    }

    return deleted;
  }

  get size(): number {
    return this.entries.size;
  }
}
