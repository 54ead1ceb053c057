import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthEnv } from './types/hono.js';
import type { TokenEngine } from './engine.js';
import { authErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import {
  createLoginRoutes,
  createRefreshRoutes,
  createLogoutRoutes,
  createMeRoutes,
} from './routes/auth/index.js';
import { createAdminRoutes } from './routes/admin/index.js';

export interface AuthServerOptions {
  engine: TokenEngine;
  enableCors?: boolean;
  enableLogging?: boolean;
  /**
   * Admin API key. The admin API is not mounted without one.
   */
  adminApiKey?: string;
}

/**
 * Create the HTTP application around a token engine
 */
export function createAuthServer(options: AuthServerOptions): Hono<AuthEnv> {
  const { engine, enableCors = true, enableLogging = true, adminApiKey } = options;

  const app = new Hono<AuthEnv>();

  // Global error handler
  app.onError(authErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (needed for token endpoints from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        maxAge: 86400,
      })
    );
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  if (adminApiKey) {
    app.route('/_admin', createAdminRoutes({ engine, auth: { apiKey: adminApiKey } }));
  }

  app.route('/login', createLoginRoutes({ grants: engine.grants }));
  app.route('/refresh', createRefreshRoutes({ grants: engine.grants }));
  app.route('/logout', createLogoutRoutes({ grants: engine.grants }));
  app.route('/me', createMeRoutes({ authenticator: engine.authenticator }));

  return app;
}
