import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';
import { scopeService } from '../../services/scope-service.js';
import { rejectInvalid } from '../validation.js';
import { toTokenPairResponse, setNoStore } from './token-response.js';

export const loginSchema = z.object({
  username: z.string().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  scope: z.string().optional(),
});

export interface LoginRouteOptions {
  grants: GrantEngine;
}

/**
 * POST /login
 *
 * Password grant: credentials in, a fresh token pair out
 */
export function createLoginRoutes(options: LoginRouteOptions) {
  const { grants } = options;

  const router = new Hono<AuthEnv>();

  router.post('/', zValidator('json', loginSchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');

    const pair = await grants.passwordGrant({
      identifier: body.username,
      secret: body.password,
      scopes: scopeService.parseScopes(body.scope),
    });

    setNoStore(c);
    return c.json(toTokenPairResponse(pair));
  });

  return router;
}
