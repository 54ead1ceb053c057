import type { IStorage } from '../interfaces/index.js';
import { MemoryRefreshFamilyStorage } from './refresh-family-storage.js';
import { MemoryRevocationListStorage } from './revocation-list-storage.js';

export { MemoryRefreshFamilyStorage } from './refresh-family-storage.js';
export { MemoryRevocationListStorage } from './revocation-list-storage.js';
export { MemoryIdentityVerifier, type AddIdentityInput } from './identity-verifier.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  return {
    refreshFamilies: new MemoryRefreshFamilyStorage(),
    revocationList: new MemoryRevocationListStorage(),
  };
}
