import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { RevokeTokenResponse } from '@tokenline/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';
import { rejectInvalid } from '../validation.js';

const revokeTokenSchema = z.object({
  token: z.string().min(1, 'token is required'),
});

export interface TokenRoutesOptions {
  grants: GrantEngine;
}

export function createTokenRoutes(options: TokenRoutesOptions) {
  const { grants } = options;
  const app = new Hono<AuthEnv>();

  // Blacklist a single access token. A no-op while the blacklist is off.
  app.post('/revoke', zValidator('json', revokeTokenSchema, rejectInvalid), async (c) => {
    const { token } = c.req.valid('json');

    const response: RevokeTokenResponse = {
      revoked: await grants.revokeAccessToken(token),
    };
    return c.json(response);
  });

  return app;
}
