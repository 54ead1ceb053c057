import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';
import { scopeService } from '../../services/scope-service.js';
import { rejectInvalid } from '../validation.js';
import { toTokenPairResponse, setNoStore } from './token-response.js';

export const refreshSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required'),
  scope: z.string().optional(),
});

export interface RefreshRouteOptions {
  grants: GrantEngine;
}

/**
 * POST /refresh
 *
 * Rotates the presented refresh token. The old one is dead afterwards;
 * presenting it again revokes the whole family.
 */
export function createRefreshRoutes(options: RefreshRouteOptions) {
  const { grants } = options;

  const router = new Hono<AuthEnv>();

  router.post('/', zValidator('json', refreshSchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');

    const pair = await grants.refreshGrant({
      refreshToken: body.refresh_token,
      scopes: scopeService.parseScopes(body.scope),
    });

    setNoStore(c);
    return c.json(toTokenPairResponse(pair));
  });

  return router;
}
