import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';

export interface FamilyRoutesOptions {
  grants: GrantEngine;
}

export function createFamilyRoutes(options: FamilyRoutesOptions) {
  const { grants } = options;
  const app = new Hono<AuthEnv>();

  // Inspect a family
  app.get('/:id', async (c) => {
    const summary = await grants.describeFamily(c.req.param('id'));

    if (!summary) {
      return c.json({ error: 'not_found', error_description: 'Token family not found' }, 404);
    }

    return c.json(summary);
  });

  // Revoke a family
  app.post('/:id/revoke', async (c) => {
    const tokenFamilyId = c.req.param('id');

    if (!(await grants.describeFamily(tokenFamilyId))) {
      return c.json({ error: 'not_found', error_description: 'Token family not found' }, 404);
    }

    await grants.logout(tokenFamilyId);

    return c.json({ tokenFamilyId, state: await grants.getSessionState(tokenFamilyId) });
  });

  return app;
}
