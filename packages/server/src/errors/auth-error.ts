import type { AuthErrorResponse } from '@tokenline/shared';
import {
  type AuthErrorCode,
  type AuthErrorReason,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_UNAUTHORIZED,
  ERROR_FORBIDDEN,
  ERROR_RETRYABLE_CONFLICT,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * Caller-facing authentication error
 *
 * Carries only what a client may see. Internal failure detail stays on
 * `cause`.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly description: string;
  public readonly reason?: AuthErrorReason;

  constructor(
    code: AuthErrorCode,
    description?: string,
    options?: {
      reason?: AuthErrorReason;
      cause?: Error;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.reason) {
      this.reason = options.reason;
    }
    if (options?.cause) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    const response: AuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.reason) {
      response.reason = this.reason;
    }

    return response;
  }

  // Factory methods for common errors

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static unauthorized(reason: AuthErrorReason, description?: string, cause?: Error): AuthError {
    return new AuthError(ERROR_UNAUTHORIZED, description, { reason, cause });
  }

  static forbidden(reason: AuthErrorReason, description?: string): AuthError {
    return new AuthError(ERROR_FORBIDDEN, description, { reason });
  }

  static retryableConflict(description?: string): AuthError {
    return new AuthError(ERROR_RETRYABLE_CONFLICT, description);
  }

  static serverError(description?: string, cause?: Error): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
