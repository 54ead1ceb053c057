import type { Config } from './config/index.js';
import type { IStorage, IIdentityVerifier } from './storage/interfaces/index.js';
import { type Clock, systemClock } from './time/clock.js';
import { KeyRing } from './crypto/jwt.js';
import { TokenCodec } from './services/token-codec.js';
import { TokenStore } from './services/token-store.js';
import { TokenService } from './services/token-service.js';
import { RevocationPolicy } from './services/revocation-policy.js';
import { Authenticator } from './services/authenticator.js';
import { GrantEngine } from './grants/grant-engine.js';
import { GarbageCollector } from './maintenance/garbage-collector.js';

export type EngineConfig = Pick<Config, 'signing' | 'tokens' | 'revocation' | 'maintenance'>;

export interface TokenEngineOptions {
  config: EngineConfig;
  storage: IStorage;
  identityVerifier: IIdentityVerifier;
  clock?: Clock;
}

/**
 * Fully wired token engine
 */
export interface TokenEngine {
  keyRing: KeyRing;
  codec: TokenCodec;
  store: TokenStore;
  tokenService: TokenService;
  revocationPolicy: RevocationPolicy;
  authenticator: Authenticator;
  grants: GrantEngine;
  garbageCollector: GarbageCollector;
}

/**
 * Build every component of the engine from configuration
 */
export async function createTokenEngine(options: TokenEngineOptions): Promise<TokenEngine> {
  const { config, storage, identityVerifier, clock = systemClock } = options;

  const keyRing = await KeyRing.fromConfig(config.signing);

  const codec = new TokenCodec({
    keyRing,
    clock,
    leeway: config.tokens.clockSkewLeeway,
    issuer: config.tokens.issuer,
  });

  const store = new TokenStore({
    storage: storage.refreshFamilies,
    clock,
    leeway: config.tokens.clockSkewLeeway,
  });

  const tokenService = new TokenService({
    codec,
    clock,
    accessTokenTtl: config.tokens.accessTokenTtl,
    refreshTokenTtl: config.tokens.refreshTokenTtl,
  });

  const revocationPolicy = new RevocationPolicy({
    enabled: config.revocation.accessTokenBlacklist,
    storage: storage.revocationList,
    clock,
    accessTokenTtl: config.tokens.accessTokenTtl,
    leeway: config.tokens.clockSkewLeeway,
  });

  const authenticator = new Authenticator({ codec, revocationPolicy });

  const grants = new GrantEngine({
    codec,
    tokenService,
    store,
    identityVerifier,
    revocationPolicy,
    clock,
    leeway: config.tokens.clockSkewLeeway,
  });

  const garbageCollector = new GarbageCollector({
    store,
    revocationPolicy,
    intervalMs: config.maintenance.gcIntervalMs,
  });

  return {
    keyRing,
    codec,
    store,
    tokenService,
    revocationPolicy,
    authenticator,
    grants,
    garbageCollector,
  };
}
