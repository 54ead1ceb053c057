import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { generateSigningSecret } from '../crypto/random.js';
import { createLogger, isLogLevel, type LogLevel } from '../logging/logger.js';

const log = createLogger('config');

type Env = Record<string, string | undefined>;

export type SymmetricAlgorithm = (typeof constants.SYMMETRIC_SIGNING_ALGORITHMS)[number];
export type AsymmetricAlgorithm = (typeof constants.ASYMMETRIC_SIGNING_ALGORITHMS)[number];
export type SigningAlgorithm = SymmetricAlgorithm | AsymmetricAlgorithm;

/**
 * One entry of the signing key ring
 *
 * Asymmetric keys without `privateKey` are verify-only.
 */
export type SigningKeyConfig =
  | { kid: string; algorithm: SymmetricAlgorithm; secret: string }
  | { kid: string; algorithm: AsymmetricAlgorithm; publicKey: string; privateKey?: string };

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  secrets: {
    adminApiKey: string | undefined;
  };
  signing: {
    activeKid: string;
    keys: SigningKeyConfig[];
  };
  tokens: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    clockSkewLeeway: number;
    issuer: string | undefined;
  };
  revocation: {
    accessTokenBlacklist: boolean;
  };
  maintenance: {
    gcIntervalMs: number;
  };
  logging: {
    level: LogLevel;
  };
}

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(env: Env, envVar: string): string | undefined {
  const filePath = env[`${envVar}_FILE`];

  if (filePath) {
    if (!existsSync(filePath)) {
      throw new Error(`${envVar}_FILE points to a missing file: ${filePath}`);
    }
    return readFileSync(filePath, 'utf-8').trim();
  }

  return env[envVar];
}

function readInt(env: Env, envVar: string, fallback: number): number {
  const raw = env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw.trim()) {
    throw new Error(`${envVar} must be an integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, envVar: string, fallback: boolean): boolean {
  const raw = env[envVar]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function isSymmetricAlgorithm(value: string): value is SymmetricAlgorithm {
  return (constants.SYMMETRIC_SIGNING_ALGORITHMS as readonly string[]).includes(value);
}

function isAsymmetricAlgorithm(value: string): value is AsymmetricAlgorithm {
  return (constants.ASYMMETRIC_SIGNING_ALGORITHMS as readonly string[]).includes(value);
}

/**
 * Parse `JWT_RETIRED_KEYS`: comma separated `kid:ALG:secret` entries of
 * verify-only HMAC keys kept around after a secret rotation
 */
export function parseRetiredKeys(raw: string | undefined): SigningKeyConfig[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const [kid, algorithm, ...rest] = entry.split(':');
      const secret = rest.join(':');

      if (!kid || !algorithm || !secret) {
        throw new Error(`Invalid JWT_RETIRED_KEYS entry "${kid ?? ''}": expected kid:ALG:secret`);
      }
      if (!isSymmetricAlgorithm(algorithm)) {
        throw new Error(`Retired key "${kid}" must use an HMAC algorithm, got ${algorithm}`);
      }

      return { kid, algorithm, secret };
    });
}

function loadSigningKeys(env: Env, nodeEnv: string): Config['signing'] {
  const activeKid = env['JWT_SIGNING_KEY_ID'] ?? 'primary';
  const algorithm = env['JWT_SIGNING_ALGORITHM'] ?? constants.SIGNING_ALGORITHM_HS256;
  let signingKey = readSecret(env, 'JWT_SIGNING_KEY');

  let active: SigningKeyConfig;

  if (isSymmetricAlgorithm(algorithm)) {
    if (!signingKey) {
      if (nodeEnv === 'production') {
        throw new Error('JWT_SIGNING_KEY is required in production');
      }
      signingKey = generateSigningSecret();
      log.warn('No JWT_SIGNING_KEY configured, using an ephemeral secret', { kid: activeKid });
    }
    active = { kid: activeKid, algorithm, secret: signingKey };
  } else if (isAsymmetricAlgorithm(algorithm)) {
    const publicKey = readSecret(env, 'JWT_PUBLIC_KEY');
    if (!signingKey || !publicKey) {
      throw new Error(`${algorithm} signing requires JWT_SIGNING_KEY (PKCS#8) and JWT_PUBLIC_KEY (SPKI)`);
    }
    active = { kid: activeKid, algorithm, privateKey: signingKey, publicKey };
  } else {
    throw new Error(`Unsupported JWT_SIGNING_ALGORITHM: ${algorithm}`);
  }

  return {
    activeKid,
    keys: [active, ...parseRetiredKeys(readSecret(env, 'JWT_RETIRED_KEYS'))],
  };
}

/**
 * Check cross-field constraints. Throws on the first violation.
 */
export function validateConfig(config: Config): void {
  const { tokens, signing } = config;

  if (tokens.accessTokenTtl <= 0 || tokens.refreshTokenTtl <= 0) {
    throw new Error('Token lifetimes must be positive');
  }
  if (tokens.accessTokenTtl >= tokens.refreshTokenTtl) {
    throw new Error('ACCESS_TOKEN_TTL must be shorter than REFRESH_TOKEN_TTL');
  }
  if (tokens.clockSkewLeeway < 0) {
    throw new Error('CLOCK_SKEW_LEEWAY must not be negative');
  }
  if (config.maintenance.gcIntervalMs <= 0) {
    throw new Error('GC_INTERVAL_MS must be positive');
  }

  const kids = new Set<string>();
  for (const key of signing.keys) {
    if (kids.has(key.kid)) {
      throw new Error(`Duplicate signing key id: ${key.kid}`);
    }
    kids.add(key.kid);

    if ('secret' in key && Buffer.byteLength(key.secret, 'utf8') < constants.MIN_SECRET_LENGTH) {
      throw new Error(
        `Signing secret "${key.kid}" must be at least ${constants.MIN_SECRET_LENGTH} bytes`
      );
    }
  }

  const active = signing.keys.find((key) => key.kid === signing.activeKid);
  if (!active) {
    throw new Error(`Active signing key "${signing.activeKid}" is not in the key ring`);
  }
  if ('publicKey' in active && !active.privateKey) {
    throw new Error(`Active signing key "${signing.activeKid}" has no private key`);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Load configuration from environment variables
 *
 * The result is frozen; the signing key ring cannot change after startup.
 */
export function loadConfig(env: Env = process.env): Readonly<Config> {
  const nodeEnv = env['NODE_ENV'] ?? 'development';
  const logLevel = env['LOG_LEVEL'] ?? 'info';

  if (!isLogLevel(logLevel)) {
    throw new Error(`Unknown LOG_LEVEL: ${logLevel}`);
  }

  const config: Config = {
    server: {
      port: readInt(env, 'PORT', 3000),
      host: env['HOST'] ?? '0.0.0.0',
      nodeEnv,
    },
    secrets: {
      adminApiKey: readSecret(env, 'ADMIN_API_KEY'),
    },
    signing: loadSigningKeys(env, nodeEnv),
    tokens: {
      accessTokenTtl: readInt(env, 'ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt(env, 'REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      clockSkewLeeway: readInt(env, 'CLOCK_SKEW_LEEWAY', constants.DEFAULT_CLOCK_SKEW_LEEWAY),
      issuer: env['TOKEN_ISSUER'] || undefined,
    },
    revocation: {
      accessTokenBlacklist: readBoolean(env, 'ACCESS_TOKEN_BLACKLIST', false),
    },
    maintenance: {
      gcIntervalMs: readInt(env, 'GC_INTERVAL_MS', constants.DEFAULT_GC_INTERVAL_MS),
    },
    logging: {
      level: logLevel,
    },
  };

  validateConfig(config);

  return deepFreeze(config);
}

// Singleton config instance
let config: Readonly<Config> | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Readonly<Config> {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
