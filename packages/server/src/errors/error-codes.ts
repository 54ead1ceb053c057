import type { AuthErrorCode, RejectionReason } from '@tokenline/shared';

export type { AuthErrorCode };

/**
 * Caller-facing error codes
 */

export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UNAUTHORIZED = 'unauthorized' as const;
export const ERROR_FORBIDDEN = 'forbidden' as const;
export const ERROR_RETRYABLE_CONFLICT = 'retryable_conflict' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * HTTP status codes for caller-facing errors
 */
export const ERROR_STATUS_CODES = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UNAUTHORIZED]: 401,
  [ERROR_FORBIDDEN]: 403,
  [ERROR_RETRYABLE_CONFLICT]: 409,
  [ERROR_SERVER_ERROR]: 500,
} as const satisfies Record<AuthErrorCode, number>;

export type AuthErrorStatus = (typeof ERROR_STATUS_CODES)[AuthErrorCode];

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_UNAUTHORIZED]: 'Authentication failed.',
  [ERROR_FORBIDDEN]: 'The request requires privileges the credentials do not grant.',
  [ERROR_RETRYABLE_CONFLICT]: 'The token was modified concurrently. Retry the request.',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition.',
};

// Reasons safe to show to callers
export const REASON_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const REASON_INVALID_TOKEN = 'invalid_token' as const;
export const REASON_TOKEN_EXPIRED = 'token_expired' as const;
export const REASON_TOKEN_FAMILY_REVOKED = 'token_family_revoked' as const;
export const REASON_INSUFFICIENT_SCOPE = 'insufficient_scope' as const;

export type AuthErrorReason =
  | typeof REASON_INVALID_CREDENTIALS
  | typeof REASON_INVALID_TOKEN
  | typeof REASON_TOKEN_EXPIRED
  | typeof REASON_TOKEN_FAMILY_REVOKED
  | typeof REASON_INSUFFICIENT_SCOPE
  | RejectionReason;
