import type { Principal } from '@tokenline/shared';

/**
 * Pluggable identity verifier
 *
 * The engine does not manage users; it asks this collaborator whether a
 * credential pair is valid. Implementations must answer null for both an
 * unknown identifier and a wrong secret, and should take about as long
 * for either.
 *
 * Example implementation:
 *
 * ```typescript
 * class AccountsVerifier implements IIdentityVerifier {
 *   async verifyCredentials(identifier: string, secret: string): Promise<Principal | null> {
 *     const account = await this.accounts.findByEmail(identifier);
 *     const ok = await verifySecret(secret, account?.passwordHash ?? DUMMY_HASH);
 *     return account && ok ? { subjectId: account.id, scopes: account.scopes } : null;
 *   }
 * }
 * ```
 */
export interface IIdentityVerifier {
  /**
   * Check a credential pair
   *
   * @returns The principal, or null when the credentials are invalid
   */
  verifyCredentials(identifier: string, secret: string): Promise<Principal | null>;

  /**
   * Optional: look a principal up by subject id
   * When present, refresh grants fail for subjects that no longer exist
   */
  findPrincipal?(subjectId: string): Promise<Principal | null>;
}
