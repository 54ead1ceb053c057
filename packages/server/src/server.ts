import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createTokenEngine } from './engine.js';
import { createMemoryStorage, MemoryIdentityVerifier } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { createLogger, setLogLevel } from './logging/logger.js';

const log = createLogger('server');

// Load configuration
const config = getConfig();
setLogLevel(config.logging.level);

const storage = createMemoryStorage();

/**
 * Development identities. Replace the verifier with one backed by your
 * user store in production.
 */
const identityVerifier = new MemoryIdentityVerifier();
if (config.server.nodeEnv !== 'production') {
  await identityVerifier.addIdentity({
    identifier: 'testuser',
    password: 'test-password',
    subjectId: 'test-user-001',
    scopes: ['profile', 'read', 'write'],
  });
  log.warn('Development identity "testuser" registered');
}

const engine = await createTokenEngine({ config, storage, identityVerifier });
engine.garbageCollector.start();

const app = createAuthServer({
  engine,
  adminApiKey: config.secrets.adminApiKey,
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    log.info('Token server listening', {
      address: info.address,
      port: info.port,
      blacklist: config.revocation.accessTokenBlacklist,
      admin: Boolean(config.secrets.adminApiKey),
    });
    log.info('Running with in-memory storage. Sessions are lost on restart.');
  }
);

function shutdown(signal: string): void {
  log.info('Shutting down', { signal });
  engine.garbageCollector.stop();
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
