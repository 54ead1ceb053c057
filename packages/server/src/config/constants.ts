/**
 * Token engine constants
 */

// Token kinds
export const TOKEN_KIND_ACCESS = 'access' as const;
export const TOKEN_KIND_REFRESH = 'refresh' as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// Signing algorithms
export const SIGNING_ALGORITHM_HS256 = 'HS256' as const;
export const SIGNING_ALGORITHM_HS384 = 'HS384' as const;
export const SIGNING_ALGORITHM_HS512 = 'HS512' as const;
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;
export const SIGNING_ALGORITHM_ES256 = 'ES256' as const;

export const SYMMETRIC_SIGNING_ALGORITHMS = [
  SIGNING_ALGORITHM_HS256,
  SIGNING_ALGORITHM_HS384,
  SIGNING_ALGORITHM_HS512,
] as const;

export const ASYMMETRIC_SIGNING_ALGORITHMS = [
  SIGNING_ALGORITHM_RS256,
  SIGNING_ALGORITHM_ES256,
] as const;

// HMAC secrets shorter than this are refused (bytes)
export const MIN_SECRET_LENGTH = 32;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 900; // 15 minutes
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_CLOCK_SKEW_LEEWAY = 30;

// Garbage collection
export const DEFAULT_GC_INTERVAL_MS = 300000; // 5 minutes

// Token id length
export const TOKEN_ID_LENGTH = 16; // bytes
export const FAMILY_ID_LENGTH = 16; // bytes

// A family whose latest access token has less than this share of its
// lifetime left reports as expiring
export const EXPIRING_THRESHOLD_RATIO = 0.2;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';
export const HEADER_ADMIN_API_KEY = 'x-api-key';

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';

// Realm for WWW-Authenticate challenges
export const DEFAULT_REALM = 'api';
