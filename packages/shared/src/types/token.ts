/**
 * Token kinds carried in the `token_type` claim
 */
export type TokenKind = 'access' | 'refresh';

/**
 * Token pair response returned by `/login` and `/refresh`
 */
export interface TokenPairResponse {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  expires_in: number;
  refresh_expires_in: number;
  scope?: string;
}
