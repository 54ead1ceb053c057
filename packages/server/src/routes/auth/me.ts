import { Hono } from 'hono';
import type { MeResponse } from '@tokenline/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { Authenticator } from '../../services/authenticator.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { scopeService } from '../../services/scope-service.js';
import { AuthError } from '../../errors/auth-error.js';

export interface MeRouteOptions {
  authenticator: Authenticator;
}

/**
 * GET /me
 *
 * Echoes the principal behind a bearer access token
 */
export function createMeRoutes(options: MeRouteOptions) {
  const { authenticator } = options;

  const router = new Hono<AuthEnv>();

  router.get('/', bearerAuth({ authenticator }), (c) => {
    const claims = c.get('accessToken');
    if (!claims) {
      throw AuthError.serverError('Bearer middleware did not set the access token');
    }

    const response: MeResponse = {
      sub: claims.subjectId,
      scope: scopeService.formatScopes(claims.scopes),
      token_family_id: claims.tokenFamilyId,
    };

    return c.json(response);
  });

  return router;
}
