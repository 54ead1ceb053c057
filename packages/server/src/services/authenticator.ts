import type { Principal, RejectionReason } from '@tokenline/shared';
import type { TokenClaims } from '../types/token.js';
import type { TokenCodec } from './token-codec.js';
import type { RevocationPolicy } from './revocation-policy.js';
import { isTokenError, type TokenErrorKind } from '../errors/token-error.js';
import { TOKEN_KIND_ACCESS } from '../config/constants.js';

/**
 * Result of checking an access token
 */
export type AuthenticationResult =
  | { authenticated: true; principal: Principal; claims: TokenClaims }
  | { authenticated: false; reason: RejectionReason };

const REJECTION_BY_KIND: Partial<Record<TokenErrorKind, RejectionReason>> = {
  malformed: 'malformed',
  expired: 'expired',
  signature_invalid: 'signature_invalid',
};

export interface AuthenticatorOptions {
  codec: TokenCodec;
  revocationPolicy?: RevocationPolicy;
}

/**
 * Access token check used by request routing to gate protected resources
 *
 * Store-free unless the revocation policy is enabled.
 */
export class Authenticator {
  private readonly codec: TokenCodec;
  private readonly revocationPolicy?: RevocationPolicy;

  constructor(options: AuthenticatorOptions) {
    this.codec = options.codec;
    this.revocationPolicy = options.revocationPolicy;
  }

  async authenticate(rawToken: string | null | undefined): Promise<AuthenticationResult> {
    const token = rawToken?.trim();
    if (!token) {
      return { authenticated: false, reason: 'missing' };
    }

    let claims: TokenClaims;
    try {
      claims = await this.codec.verify(token);
    } catch (error) {
      const reason = isTokenError(error) ? REJECTION_BY_KIND[error.kind] : undefined;
      if (!reason) {
        throw error;
      }
      return { authenticated: false, reason };
    }

    if (claims.tokenType !== TOKEN_KIND_ACCESS) {
      return { authenticated: false, reason: 'malformed' };
    }

    if (this.revocationPolicy?.enabled && (await this.revocationPolicy.isRevoked(claims))) {
      return { authenticated: false, reason: 'revoked' };
    }

    return {
      authenticated: true,
      principal: { subjectId: claims.subjectId, scopes: claims.scopes },
      claims,
    };
  }
}
