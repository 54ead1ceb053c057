import type { Context } from 'hono';
import type { TokenPairResponse } from '@tokenline/shared';
import type { TokenPair } from '../../types/token.js';
import { scopeService } from '../../services/scope-service.js';
import {
  TOKEN_TYPE_BEARER,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export function toTokenPairResponse(pair: TokenPair): TokenPairResponse {
  const response: TokenPairResponse = {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: TOKEN_TYPE_BEARER,
    expires_in: pair.expiresIn,
    refresh_expires_in: pair.refreshExpiresIn,
  };

  if (pair.scopes.length > 0) {
    response.scope = scopeService.formatScopes(pair.scopes);
  }

  return response;
}

/**
 * Token responses must never be cached
 */
export function setNoStore(c: Context): void {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);
}
