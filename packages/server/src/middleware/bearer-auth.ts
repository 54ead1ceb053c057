import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import type { Authenticator } from '../services/authenticator.js';
import { AuthError } from '../errors/auth-error.js';
import { REASON_INSUFFICIENT_SCOPE } from '../errors/error-codes.js';
import { scopeService } from '../services/scope-service.js';
import { HEADER_AUTHORIZATION, HEADER_WWW_AUTHENTICATE, DEFAULT_REALM } from '../config/constants.js';

export interface BearerAuthOptions {
  authenticator: Authenticator;
  requiredScopes?: string[];
  realm?: string;
}

/**
 * Extract bearer token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const [scheme, token, ...rest] = authHeader.trim().split(/\s+/);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }
  return token;
}

/**
 * Middleware to validate bearer access tokens
 *
 * Sets `principal` and `accessToken` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<AuthEnv> {
  const { authenticator, requiredScopes, realm = DEFAULT_REALM } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    const token = extractBearerToken(authHeader);

    if (authHeader && !token) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${realm}", error="invalid_request"`);
      throw AuthError.unauthorized('malformed', 'Invalid authorization header format');
    }

    const result = await authenticator.authenticate(token);

    if (!result.authenticated) {
      c.header(
        HEADER_WWW_AUTHENTICATE,
        result.reason === 'missing'
          ? `Bearer realm="${realm}"`
          : `Bearer realm="${realm}", error="invalid_token"`
      );
      throw AuthError.unauthorized(result.reason, 'Access token rejected');
    }

    if (requiredScopes && requiredScopes.length > 0) {
      if (!scopeService.hasAllScopes(result.principal.scopes, requiredScopes)) {
        c.header(
          HEADER_WWW_AUTHENTICATE,
          `Bearer realm="${realm}", error="insufficient_scope", scope="${requiredScopes.join(' ')}"`
        );
        throw AuthError.forbidden(
          REASON_INSUFFICIENT_SCOPE,
          `Required scopes: ${requiredScopes.join(' ')}`
        );
      }
    }

    c.set('principal', result.principal);
    c.set('accessToken', result.claims);

    await next();
  };
}

/**
 * Create bearer auth middleware with specific required scopes
 */
export function requireScopes(
  options: Omit<BearerAuthOptions, 'requiredScopes'>,
  scopes: string[]
): MiddlewareHandler<AuthEnv> {
  return bearerAuth({ ...options, requiredScopes: scopes });
}
