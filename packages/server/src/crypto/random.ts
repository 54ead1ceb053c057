import { randomBytes } from 'node:crypto';
import { TOKEN_ID_LENGTH, FAMILY_ID_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateTokenId(): string {
  return generateRandomBase64Url(TOKEN_ID_LENGTH);
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return generateRandomBase64Url(FAMILY_ID_LENGTH);
}

/**
 * Generate an HMAC signing secret
 */
export function generateSigningSecret(length: number = 48): string {
  return generateRandomBase64Url(length);
}
