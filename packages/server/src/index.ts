// Export for programmatic use
export { createAuthServer, type AuthServerOptions } from './app.js';
export { createTokenEngine, type TokenEngine, type TokenEngineOptions, type EngineConfig } from './engine.js';
export * from './storage/memory/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
export * from './time/clock.js';
export * from './logging/logger.js';
export { TokenCodec, tokenClaimsSchema } from './services/token-codec.js';
export { TokenStore } from './services/token-store.js';
export { TokenService } from './services/token-service.js';
export { RevocationPolicy } from './services/revocation-policy.js';
export { Authenticator, type AuthenticationResult } from './services/authenticator.js';
export { ScopeService, scopeService } from './services/scope-service.js';
export { GrantEngine } from './grants/grant-engine.js';
export { SESSION_TRANSITIONS, canTransition, deriveSessionState } from './grants/session-state.js';
export { GarbageCollector } from './maintenance/garbage-collector.js';
export { bearerAuth, requireScopes, extractBearerToken } from './middleware/bearer-auth.js';
