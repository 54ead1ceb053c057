import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import { AuthError } from '../../errors/auth-error.js';
import { constantTimeCompare } from '../../crypto/hash.js';
import { extractBearerToken } from '../../middleware/bearer-auth.js';
import { ERROR_FORBIDDEN } from '../../errors/error-codes.js';
import { HEADER_ADMIN_API_KEY, HEADER_AUTHORIZATION } from '../../config/constants.js';

export interface AdminAuthOptions {
  apiKey: string;
  headerName?: string;
}

/**
 * Admin API authentication middleware
 * Validates API key from header
 */
export function adminAuth(options: AdminAuthOptions): MiddlewareHandler<AuthEnv> {
  const { apiKey, headerName = HEADER_ADMIN_API_KEY } = options;

  return async (c, next) => {
    const providedKey = c.req.header(headerName) ?? extractBearerToken(c.req.header(HEADER_AUTHORIZATION));

    if (!providedKey) {
      throw AuthError.unauthorized('missing', 'API key required');
    }

    if (!constantTimeCompare(providedKey, apiKey)) {
      throw new AuthError(ERROR_FORBIDDEN, 'Invalid API key');
    }

    await next();
  };
}
