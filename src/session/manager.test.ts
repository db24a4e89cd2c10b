/**
 * Unit tests for SessionManager
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { isSessionConflict, SessionManager, type Session, type SessionConflict } from './manager.js';

const DURATION_MS = 1000;

function expectSession(result: Session | SessionConflict): Session {
  if (isSessionConflict(result)) {
    throw new Error('expected a session, got a conflict');
  }
  return result;
}

describe('SessionManager', () => {
  let clock: number;
  let sessions: SessionManager;

  beforeEach(() => {
    clock = 10_000;
    sessions = new SessionManager({ durationMs: DURATION_MS, now: () => clock });
  });

  describe('createSession', () => {
    it('creates a session expiring after the configured duration', () => {
      const session = expectSession(sessions.createSession());

      expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(session.expiresAt).toBe(11_000);
      expect(sessions.current()).toEqual(session);
    });

    it('refuses while another session is alive', () => {
      const first = expectSession(sessions.createSession());

      expect(sessions.createSession(false)).toEqual({ conflict: true, expiresAt: 11_000 });
      expect(sessions.current()?.id).toBe(first.id);
    });

    it('replaces a live session when asked to clear it', () => {
      const first = expectSession(sessions.createSession());
      const second = expectSession(sessions.createSession(true));

      expect(second.id).not.toBe(first.id);
      expect(sessions.validateAndTouch(first.id)).toBe(false);
      expect(sessions.validateAndTouch(second.id)).toBe(true);
    });

    it('replaces an expired session without clearing', () => {
      expectSession(sessions.createSession());
      clock += DURATION_MS;

      expect(isSessionConflict(sessions.createSession())).toBe(false);
    });
  });

  describe('validateAndTouch', () => {
    it('rejects when no session exists', () => {
      expect(sessions.validateAndTouch('anything')).toBe(false);
    });

    it('rejects a missing or mismatched id', () => {
      expectSession(sessions.createSession());

      expect(sessions.validateAndTouch(undefined)).toBe(false);
      expect(sessions.validateAndTouch('')).toBe(false);
      expect(sessions.validateAndTouch('not-the-session')).toBe(false);
    });

    it('slides the expiration on success', () => {
      const session = expectSession(sessions.createSession());
      clock += 600;

      expect(sessions.validateAndTouch(session.id)).toBe(true);
      expect(sessions.current()?.expiresAt).toBe(11_600);

      // Still alive past the first expiry
      clock += 600;
      expect(sessions.validateAndTouch(session.id)).toBe(true);
    });

    it('evicts a session once it has expired', () => {
      const session = expectSession(sessions.createSession());
      clock += DURATION_MS;

      expect(sessions.validateAndTouch(session.id)).toBe(false);
      expect(sessions.current()).toBeNull();
    });

    it('does not extend on a mismatched id', () => {
      expectSession(sessions.createSession());
      clock += 500;
      sessions.validateAndTouch('not-the-session');

      expect(sessions.current()?.expiresAt).toBe(11_000);
    });
  });

  describe('clear', () => {
    it('evicts the session unconditionally', () => {
      const session = expectSession(sessions.createSession());
      sessions.clear();

      expect(sessions.current()).toBeNull();
      expect(sessions.validateAndTouch(session.id)).toBe(false);
      expect(isSessionConflict(sessions.createSession())).toBe(false);
    });
  });

  it('rejects a non-positive duration', () => {
    expect(() => new SessionManager({ durationMs: 0 })).toThrow('Session duration must be positive, got 0');
  });
});
