import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import type { TokenEngine } from '../../engine.js';
import { adminAuth, type AdminAuthOptions } from './middleware.js';
import { createFamilyRoutes } from './families.js';
import { createSubjectRoutes } from './subjects.js';
import { createTokenRoutes } from './tokens.js';
import { createMaintenanceRoutes } from './maintenance.js';

export interface AdminRoutesOptions {
  engine: TokenEngine;
  auth: AdminAuthOptions;
}

/**
 * Create the admin API routes
 * Mount at /_admin prefix
 */
export function createAdminRoutes(options: AdminRoutesOptions) {
  const { engine, auth } = options;
  const app = new Hono<AuthEnv>();

  // Apply authentication middleware
  app.use('*', adminAuth(auth));

  app.route('/families', createFamilyRoutes({ grants: engine.grants }));
  app.route('/subjects', createSubjectRoutes({ grants: engine.grants }));
  app.route('/tokens', createTokenRoutes({ grants: engine.grants }));
  app.route('/maintenance', createMaintenanceRoutes({ garbageCollector: engine.garbageCollector }));

  return app;
}

export { adminAuth } from './middleware.js';
export type { AdminAuthOptions } from './middleware.js';
