/**
 * Authenticated subject as seen by protected resources
 */
export interface Principal {
  subjectId: string;
  scopes: string[];
}

/**
 * Why an access token was rejected
 */
export type RejectionReason =
  | 'missing'
  | 'malformed'
  | 'expired'
  | 'signature_invalid'
  | 'revoked';

/**
 * Caller-facing error codes
 */
export type AuthErrorCode =
  | 'invalid_request'
  | 'unauthorized'
  | 'forbidden'
  | 'retryable_conflict'
  | 'server_error';

/**
 * Error response body
 */
export interface AuthErrorResponse {
  error: AuthErrorCode;
  error_description?: string;
  reason?: string;
}

/**
 * `GET /me` response
 */
export interface MeResponse {
  sub: string;
  scope: string;
  token_family_id: string;
}
