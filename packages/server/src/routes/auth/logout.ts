import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';
import { rejectInvalid } from '../validation.js';
import { setNoStore } from './token-response.js';

export const logoutSchema = z.object({
  refresh_token: z.string().min(1, 'refresh_token is required'),
});

export interface LogoutRouteOptions {
  grants: GrantEngine;
}

/**
 * POST /logout
 *
 * Always answers 200 so the response says nothing about the token.
 */
export function createLogoutRoutes(options: LogoutRouteOptions) {
  const { grants } = options;

  const router = new Hono<AuthEnv>();

  router.post('/', zValidator('json', logoutSchema, rejectInvalid), async (c) => {
    const body = c.req.valid('json');

    await grants.logoutWithRefreshToken(body.refresh_token);

    setNoStore(c);
    return c.json({});
  });

  return router;
}
