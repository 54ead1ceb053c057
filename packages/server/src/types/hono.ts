import type { Principal } from '@tokenline/shared';
import type { TokenClaims } from './token.js';

/**
 * Hono context variables set by the bearer middleware
 */
export interface AuthVariables {
  principal?: Principal;
  accessToken?: TokenClaims;
}

export type AuthEnv = { Variables: AuthVariables };
