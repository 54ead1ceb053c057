/**
 * Lifecycle state of a token family
 */
export type SessionState =
  | 'unauthenticated'
  | 'authenticated'
  | 'active'
  | 'expiring'
  | 'refreshing'
  | 'revoked';

/**
 * Admin view of a refresh token family. The current hash is never exposed.
 */
export interface FamilySummary {
  tokenFamilyId: string;
  subjectId: string;
  scopes: string[];
  state: SessionState;
  rotationCount: number;
  issuedAt: string;
  updatedAt: string;
  expiresAt: string;
  revokedAt?: string;
}

export interface RevokeSubjectResponse {
  revokedCount: number;
}

export interface RevokeTokenResponse {
  revoked: boolean;
}
