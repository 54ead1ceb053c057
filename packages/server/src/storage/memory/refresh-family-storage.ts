import type { CreateFamilyInput, RefreshRecord } from '../../types/token.js';
import type {
  IRefreshFamilyStorage,
  FamilySnapshot,
  FamilyRotation,
} from '../interfaces/refresh-family-storage.js';

function copyRecord(record: RefreshRecord): RefreshRecord {
  return { ...record, scopes: [...record.scopes] };
}

/**
 * In-memory refresh family storage implementation
 *
 * Every method does its read-check-write without awaiting in between, so
 * a compare-and-swap cannot interleave with another on the event loop.
 */
export class MemoryRefreshFamilyStorage implements IRefreshFamilyStorage {
  private families = new Map<string, RefreshRecord>();
  private subjectIndex = new Map<string, Set<string>>(); // subjectId -> Set<tokenFamilyId>

  async insert(input: CreateFamilyInput, issuedAt: Date): Promise<boolean> {
    if (this.families.has(input.tokenFamilyId)) {
      return false;
    }

    const record: RefreshRecord = {
      tokenFamilyId: input.tokenFamilyId,
      currentRefreshTokenHash: input.refreshTokenHash,
      subjectId: input.subjectId,
      scopes: [...input.scopes],
      issuedAt,
      updatedAt: issuedAt,
      expiresAt: input.expiresAt,
      revoked: false,
      rotationCount: 0,
    };

    this.families.set(record.tokenFamilyId, record);

    let subjectFamilies = this.subjectIndex.get(record.subjectId);
    if (!subjectFamilies) {
      subjectFamilies = new Set();
      this.subjectIndex.set(record.subjectId, subjectFamilies);
    }
    subjectFamilies.add(record.tokenFamilyId);

    return true;
  }

  async findByFamilyId(tokenFamilyId: string): Promise<RefreshRecord | null> {
    const record = this.families.get(tokenFamilyId);
    return record ? copyRecord(record) : null;
  }

  async compareAndSwapHash(
    tokenFamilyId: string,
    expected: FamilySnapshot,
    next: FamilyRotation
  ): Promise<RefreshRecord | null> {
    const record = this.families.get(tokenFamilyId);

    if (
      !record ||
      record.revoked ||
      record.currentRefreshTokenHash !== expected.hash ||
      record.rotationCount !== expected.rotationCount
    ) {
      return null;
    }

    const updated: RefreshRecord = {
      ...record,
      currentRefreshTokenHash: next.hash,
      updatedAt: next.updatedAt,
      expiresAt: next.expiresAt,
      rotationCount: record.rotationCount + 1,
    };

    this.families.set(tokenFamilyId, updated);
    return copyRecord(updated);
  }

  async markRevoked(tokenFamilyId: string, revokedAt: Date): Promise<boolean> {
    const record = this.families.get(tokenFamilyId);
    if (!record || record.revoked) {
      return false;
    }

    this.families.set(tokenFamilyId, { ...record, revoked: true, revokedAt });
    return true;
  }

  async markRevokedBySubject(subjectId: string, revokedAt: Date): Promise<string[]> {
    const familyIds = this.subjectIndex.get(subjectId);
    if (!familyIds) return [];

    const revoked: string[] = [];
    for (const id of familyIds) {
      const record = this.families.get(id);
      if (record && !record.revoked) {
        this.families.set(id, { ...record, revoked: true, revokedAt });
        revoked.push(id);
      }
    }
    return revoked;
  }

  async deleteExpired(cutoff: Date): Promise<number> {
    let deleted = 0;

    for (const [id, record] of this.families) {
      if (record.expiresAt < cutoff) {
        const subjectFamilies = this.subjectIndex.get(record.subjectId);
        subjectFamilies?.delete(id);
        if (subjectFamilies?.size === 0) {
          this.subjectIndex.delete(record.subjectId);
        }

        this.families.delete(id);
        deleted++;
      }
    }

    return deleted;
  }

  /**
   * Number of stored families (for tests and stats)
   */
  get size(): number {
    return this.families.size;
  }
}
