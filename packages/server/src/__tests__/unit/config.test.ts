import { describe, it, expect } from 'vitest';
import { loadConfig, parseRetiredKeys } from '../../config/index.js';
import { TEST_SECRET, OTHER_SECRET } from '../test-setup.js';

describe('Configuration', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ JWT_SIGNING_KEY: TEST_SECRET });

    expect(config.tokens).toEqual({
      accessTokenTtl: 900,
      refreshTokenTtl: 2592000,
      clockSkewLeeway: 30,
      issuer: undefined,
    });
    expect(config.signing).toEqual({
      activeKid: 'primary',
      keys: [{ kid: 'primary', algorithm: 'HS256', secret: TEST_SECRET }],
    });
    expect(config.revocation.accessTokenBlacklist).toBe(false);
    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.logging.level).toBe('info');
    expect(config.secrets.adminApiKey).toBeUndefined();
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      JWT_SIGNING_KEY: TEST_SECRET,
      JWT_SIGNING_KEY_ID: '2024-02',
      JWT_SIGNING_ALGORITHM: 'HS512',
      JWT_RETIRED_KEYS: `2024-01:HS256:${OTHER_SECRET}`,
      ACCESS_TOKEN_TTL: '300',
      REFRESH_TOKEN_TTL: '86400',
      CLOCK_SKEW_LEEWAY: '5',
      TOKEN_ISSUER: 'https://auth.test',
      ACCESS_TOKEN_BLACKLIST: 'true',
      GC_INTERVAL_MS: '1000',
      ADMIN_API_KEY: 'test-admin-key',
      LOG_LEVEL: 'warn',
    });

    expect(config.signing).toEqual({
      activeKid: '2024-02',
      keys: [
        { kid: '2024-02', algorithm: 'HS512', secret: TEST_SECRET },
        { kid: '2024-01', algorithm: 'HS256', secret: OTHER_SECRET },
      ],
    });
    expect(config.tokens).toEqual({
      accessTokenTtl: 300,
      refreshTokenTtl: 86400,
      clockSkewLeeway: 5,
      issuer: 'https://auth.test',
    });
    expect(config.revocation.accessTokenBlacklist).toBe(true);
    expect(config.maintenance.gcIntervalMs).toBe(1000);
    expect(config.secrets.adminApiKey).toBe('test-admin-key');
    expect(config.logging.level).toBe('warn');
  });

  it('should freeze the result', () => {
    const config = loadConfig({ JWT_SIGNING_KEY: TEST_SECRET });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tokens)).toBe(true);
    expect(Object.isFrozen(config.signing.keys[0])).toBe(true);
  });

  it('should generate an ephemeral secret outside production', () => {
    const config = loadConfig({});
    const [key] = config.signing.keys;

    expect(key).toMatchObject({ kid: 'primary', algorithm: 'HS256' });
    expect(key !== undefined && 'secret' in key ? key.secret.length : 0).toBeGreaterThanOrEqual(32);
  });

  it('should require a signing key in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('JWT_SIGNING_KEY is required in production');
  });

  it('should refuse short secrets', () => {
    expect(() => loadConfig({ JWT_SIGNING_KEY: 'test-secret' })).toThrow(
      'Signing secret "primary" must be at least 32 bytes'
    );
  });

  it('should refuse an access lifetime that is not shorter than the refresh lifetime', () => {
    expect(() =>
      loadConfig({ JWT_SIGNING_KEY: TEST_SECRET, ACCESS_TOKEN_TTL: '3600', REFRESH_TOKEN_TTL: '3600' })
    ).toThrow('ACCESS_TOKEN_TTL must be shorter than REFRESH_TOKEN_TTL');
  });

  it('should refuse values that are not integers', () => {
    expect(() => loadConfig({ JWT_SIGNING_KEY: TEST_SECRET, ACCESS_TOKEN_TTL: '15m' })).toThrow(
      'ACCESS_TOKEN_TTL must be an integer, got "15m"'
    );
  });

  it('should refuse unknown algorithms and log levels', () => {
    expect(() => loadConfig({ JWT_SIGNING_KEY: TEST_SECRET, JWT_SIGNING_ALGORITHM: 'none' })).toThrow(
      'Unsupported JWT_SIGNING_ALGORITHM: none'
    );
    expect(() => loadConfig({ JWT_SIGNING_KEY: TEST_SECRET, LOG_LEVEL: 'verbose' })).toThrow(
      'Unknown LOG_LEVEL: verbose'
    );
  });

  it('should refuse duplicate key ids', () => {
    expect(() =>
      loadConfig({ JWT_SIGNING_KEY: TEST_SECRET, JWT_RETIRED_KEYS: `primary:HS256:${OTHER_SECRET}` })
    ).toThrow('Duplicate signing key id: primary');
  });

  it('should fail when a secret file is missing', () => {
    expect(() => loadConfig({ JWT_SIGNING_KEY_FILE: '/nonexistent/jwt-signing-key' })).toThrow(
      'JWT_SIGNING_KEY_FILE points to a missing file: /nonexistent/jwt-signing-key'
    );
  });

  it('should require both halves of an asymmetric key', () => {
    expect(() => loadConfig({ JWT_SIGNING_ALGORITHM: 'ES256', JWT_SIGNING_KEY: 'test-private-key' })).toThrow(
      'ES256 signing requires JWT_SIGNING_KEY (PKCS#8) and JWT_PUBLIC_KEY (SPKI)'
    );
  });

  describe('parseRetiredKeys', () => {
    it('should parse entries and keep colons inside secrets', () => {
      expect(parseRetiredKeys(' a:HS256:one:two , b:HS384:three ')).toEqual([
        { kid: 'a', algorithm: 'HS256', secret: 'one:two' },
        { kid: 'b', algorithm: 'HS384', secret: 'three' },
      ]);
      expect(parseRetiredKeys(undefined)).toEqual([]);
    });

    it('should refuse incomplete or asymmetric entries', () => {
      expect(() => parseRetiredKeys('a:HS256')).toThrow('Invalid JWT_RETIRED_KEYS entry "a": expected kid:ALG:secret');
      expect(() => parseRetiredKeys('a:RS256:secret')).toThrow(
        'Retired key "a" must use an HMAC algorithm, got RS256'
      );
    });
  });
});
