import { Hono } from 'hono';
import type { RevokeSubjectResponse } from '@tokenline/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { GrantEngine } from '../../grants/grant-engine.js';

export interface SubjectRoutesOptions {
  grants: GrantEngine;
}

export function createSubjectRoutes(options: SubjectRoutesOptions) {
  const { grants } = options;
  const app = new Hono<AuthEnv>();

  // Log a subject out everywhere
  app.post('/:id/revoke', async (c) => {
    const response: RevokeSubjectResponse = {
      revokedCount: await grants.logoutSubject(c.req.param('id')),
    };
    return c.json(response);
  });

  return app;
}
