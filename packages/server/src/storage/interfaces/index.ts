export * from './refresh-family-storage.js';
export * from './revocation-list-storage.js';
export * from './identity-verifier.js';

import type { IRefreshFamilyStorage } from './refresh-family-storage.js';
import type { IRevocationListStorage } from './revocation-list-storage.js';

/**
 * Complete storage interface for the token engine
 */
export interface IStorage {
  refreshFamilies: IRefreshFamilyStorage;
  revocationList: IRevocationListStorage;
}
