import { describe, it, expect } from 'vitest';
import type { SessionState } from '@tokenline/shared';
import { SESSION_TRANSITIONS, canTransition, deriveSessionState } from '../../grants/session-state.js';
import type { RefreshRecord } from '../../types/token.js';
import { TEST_START, LEEWAY } from '../test-setup.js';

const ACCESS_TTL = 900;

function record(overrides: Partial<RefreshRecord> = {}): RefreshRecord {
  return {
    tokenFamilyId: 'family-1',
    currentRefreshTokenHash: 'hash-0',
    subjectId: 'user-1',
    scopes: [],
    issuedAt: TEST_START,
    updatedAt: TEST_START,
    expiresAt: new Date(TEST_START.getTime() + 3600 * 1000),
    revoked: false,
    rotationCount: 0,
    ...overrides,
  };
}

function secondsAfterStart(seconds: number): Date {
  return new Date(TEST_START.getTime() + seconds * 1000);
}

describe('Session state machine', () => {
  it('should only leave unauthenticated through a login', () => {
    expect(SESSION_TRANSITIONS.unauthenticated).toEqual(['authenticated']);
  });

  it('should make revoked terminal', () => {
    const states: SessionState[] = ['unauthenticated', 'authenticated', 'active', 'expiring', 'refreshing', 'revoked'];

    for (const state of states) {
      expect(canTransition('revoked', state)).toBe(false);
    }
  });

  it('should allow a refresh from every live state', () => {
    expect(canTransition('authenticated', 'refreshing')).toBe(true);
    expect(canTransition('active', 'refreshing')).toBe(true);
    expect(canTransition('expiring', 'refreshing')).toBe(true);
    expect(canTransition('unauthenticated', 'refreshing')).toBe(false);
    expect(canTransition('refreshing', 'refreshing')).toBe(false);
  });

  it('should end a refresh in active or revoked', () => {
    expect(SESSION_TRANSITIONS.refreshing).toEqual(['active', 'revoked']);
  });

  describe('deriveSessionState', () => {
    it('should report a missing record as unauthenticated', () => {
      expect(deriveSessionState(null, TEST_START, ACCESS_TTL)).toBe('unauthenticated');
    });

    it('should report a fresh login as authenticated', () => {
      expect(deriveSessionState(record(), TEST_START, ACCESS_TTL)).toBe('authenticated');
    });

    it('should report a rotated family as active', () => {
      expect(deriveSessionState(record({ rotationCount: 2 }), secondsAfterStart(60), ACCESS_TTL)).toBe('active');
    });

    it('should report expiring once most of the access lifetime has passed', () => {
      expect(deriveSessionState(record({ rotationCount: 1 }), secondsAfterStart(719), ACCESS_TTL)).toBe('active');
      expect(deriveSessionState(record({ rotationCount: 1 }), secondsAfterStart(721), ACCESS_TTL)).toBe('expiring');
    });

    it('should report a family past its refresh lifetime as unauthenticated', () => {
      expect(deriveSessionState(record(), secondsAfterStart(3600), ACCESS_TTL)).toBe('unauthenticated');
    });

    it('should extend the refresh lifetime by the leeway', () => {
      expect(deriveSessionState(record(), secondsAfterStart(3600 + LEEWAY / 2), ACCESS_TTL, LEEWAY)).toBe('expiring');
      expect(deriveSessionState(record(), secondsAfterStart(3600 + LEEWAY), ACCESS_TTL, LEEWAY)).toBe(
        'unauthenticated'
      );
    });

    it('should let revocation win over everything else', () => {
      expect(deriveSessionState(record({ revoked: true }), secondsAfterStart(7200), ACCESS_TTL)).toBe('revoked');
    });
  });
});
