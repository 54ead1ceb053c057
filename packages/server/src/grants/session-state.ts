import type { SessionState } from '@tokenline/shared';
import type { RefreshRecord } from '../types/token.js';
import { EXPIRING_THRESHOLD_RATIO } from '../config/constants.js';

/**
 * Allowed moves of a token family through the login/refresh cycle
 *
 * `revoked` is terminal: a new login starts a new family.
 */
export const SESSION_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  unauthenticated: ['authenticated'],
  authenticated: ['active', 'expiring', 'refreshing', 'revoked'],
  active: ['expiring', 'refreshing', 'revoked'],
  expiring: ['refreshing', 'revoked', 'unauthenticated'],
  refreshing: ['active', 'revoked'],
  revoked: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return SESSION_TRANSITIONS[from].includes(to);
}

/**
 * Work out where a family stands from its stored record
 *
 * The latest access token was issued at `updatedAt`; once most of its
 * lifetime has passed the family reports `expiring`. The family outlives
 * `expiresAt` by `leeway` seconds, as its refresh token does.
 */
export function deriveSessionState(
  record: RefreshRecord | null,
  now: Date,
  accessTokenTtl: number,
  leeway = 0
): SessionState {
  if (!record) {
    return 'unauthenticated';
  }

  if (record.revoked) {
    return 'revoked';
  }

  if (now.getTime() >= record.expiresAt.getTime() + leeway * 1000) {
    return 'unauthenticated';
  }

  const accessAgeSeconds = (now.getTime() - record.updatedAt.getTime()) / 1000;
  if (accessAgeSeconds >= accessTokenTtl * (1 - EXPIRING_THRESHOLD_RATIO)) {
    return 'expiring';
  }

  return record.rotationCount === 0 ? 'authenticated' : 'active';
}
