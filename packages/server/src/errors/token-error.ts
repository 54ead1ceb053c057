/**
 * Local failure kinds raised by the codec and the token store
 */
export type TokenErrorKind =
  | 'malformed'
  | 'signature_invalid'
  | 'expired'
  | 'encoding_error'
  | 'storage_conflict';

/**
 * Codec and store error. Never sent to clients as-is; the grant engine
 * and the authenticator translate it.
 */
export class TokenError extends Error {
  public readonly kind: TokenErrorKind;

  constructor(kind: TokenErrorKind, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'TokenError';
    this.kind = kind;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  static malformed(message: string, cause?: unknown): TokenError {
    return new TokenError('malformed', message, { cause });
  }

  static signatureInvalid(message = 'Token signature verification failed', cause?: unknown): TokenError {
    return new TokenError('signature_invalid', message, { cause });
  }

  static expired(message = 'Token has expired', cause?: unknown): TokenError {
    return new TokenError('expired', message, { cause });
  }

  static encoding(message: string, cause?: unknown): TokenError {
    return new TokenError('encoding_error', message, { cause });
  }

  static storageConflict(message: string): TokenError {
    return new TokenError('storage_conflict', message);
  }
}

export function isTokenError(error: unknown, kind?: TokenErrorKind): error is TokenError {
  return error instanceof TokenError && (kind === undefined || error.kind === kind);
}
