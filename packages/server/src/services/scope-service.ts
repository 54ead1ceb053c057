import { AuthError } from '../errors/auth-error.js';
import { REASON_INSUFFICIENT_SCOPE } from '../errors/error-codes.js';

/**
 * Service for scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return this.normalize(scopeString.split(' '));
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Trim, drop empties and duplicates. First occurrence order is kept.
   */
  normalize(scopes: readonly string[]): string[] {
    const seen = new Set<string>();
    for (const scope of scopes) {
      const trimmed = scope.trim();
      if (trimmed.length > 0) {
        seen.add(trimmed);
      }
    }
    return [...seen];
  }

  /**
   * Narrow requested scopes to a granted set
   *
   * No request means the whole granted set. Asking for anything outside
   * the granted set is refused rather than silently dropped.
   */
  narrowScopes(granted: readonly string[], requested: readonly string[] | undefined): string[] {
    const grantedScopes = this.normalize(granted);

    if (!requested || requested.length === 0) {
      return grantedScopes;
    }

    const requestedScopes = this.normalize(requested);
    const invalidScopes = requestedScopes.filter((scope) => !grantedScopes.includes(scope));

    if (invalidScopes.length > 0) {
      throw AuthError.forbidden(
        REASON_INSUFFICIENT_SCOPE,
        `Scopes not granted: ${invalidScopes.join(', ')}`
      );
    }

    return requestedScopes;
  }

  /**
   * Check if a scope set includes all required scopes
   */
  hasAllScopes(scopes: readonly string[], requiredScopes: readonly string[]): boolean {
    return requiredScopes.every((scope) => scopes.includes(scope));
  }
}

// Singleton instance
export const scopeService = new ScopeService();
