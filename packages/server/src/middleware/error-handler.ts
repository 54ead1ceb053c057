import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { AuthEnv } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { createLogger } from '../logging/logger.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

const log = createLogger('http');

/**
 * Global error handler
 *
 * Transforms errors into JSON error responses
 */
export const authErrorHandler: ErrorHandler<AuthEnv> = (err, c) => {
  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof AuthError) {
    if (err.statusCode >= 500) {
      log.error('Request failed', { path: c.req.path, error: err.cause instanceof Error ? err.cause : err });
    } else {
      log.debug('Request rejected', { path: c.req.path, code: err.code, reason: err.reason });
    }
    return c.json(err.toJSON(), err.statusCode);
  }

  if (err instanceof ZodError) {
    const invalid = AuthError.invalidRequest(err.issues.map((issue) => issue.message).join(', '));
    return c.json(invalid.toJSON(), invalid.statusCode);
  }

  // Unparseable bodies surface from Hono's validator as 400 exceptions
  if (err instanceof HTTPException && err.status < 500) {
    const invalid = AuthError.invalidRequest(err.message || 'Invalid request');
    return c.json(invalid.toJSON(), invalid.statusCode);
  }

  log.error('Unhandled error', { path: c.req.path, error: err });

  const serverError = AuthError.serverError(
    process.env['NODE_ENV'] === 'production'
      ? 'An unexpected error occurred'
      : err.message
  );

  return c.json(serverError.toJSON(), serverError.statusCode);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'no-referrer');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log sensitive data
    log.info('Request completed', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      subject: c.get('principal')?.subjectId,
    });
  };
}
