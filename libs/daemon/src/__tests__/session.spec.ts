import type { Identity } from '@keyward/ipc';
import { SessionManager } from '../auth/session';
import { TestClock, MINUTE } from './helpers';

const mario: Identity = { username: 'mario', role: 'user', displayName: 'Mario' };
const luigi: Identity = { username: 'luigi', role: 'admin', displayName: 'Luigi' };

describe('SessionManager', () => {
  let clock: TestClock;
  let sessions: SessionManager;

  beforeEach(() => {
    clock = new TestClock();
    sessions = new SessionManager(60 * MINUTE, clock);
  });

  it('creates a session with a random base64url token', () => {
    const a = sessions.createSession(mario);
    const b = sessions.createSession(mario);

    expect(a.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(a.token).not.toBe(b.token);
    expect(a).toMatchObject({ username: 'mario', role: 'user', displayName: 'Mario' });
    expect(a.lastActivityAt).toBe(a.createdAt);
  });

  it('validates a live session', () => {
    const session = sessions.createSession(mario);
    expect(sessions.validateSession(session.token)).toBe(session);
  });

  it('returns undefined for unknown tokens', () => {
    expect(sessions.validateSession('nope')).toBeUndefined();
  });

  describe('isExpired', () => {
    it('is false at exactly the timeout and true just after', () => {
      const session = sessions.createSession(mario);
      const start = clock.now().getTime();

      expect(sessions.isExpired(session, new Date(start + 60 * MINUTE))).toBe(false);
      expect(sessions.isExpired(session, new Date(start + 60 * MINUTE + 1))).toBe(true);
    });
  });

  it('destroys an idle session on lookup and does not refresh it', () => {
    const session = sessions.createSession(mario);
    clock.advance(60 * MINUTE + 1);

    expect(sessions.validateSession(session.token)).toBeUndefined();
    expect(sessions.getSessionCount()).toBe(0);
  });

  it('touch extends the idle window', () => {
    const session = sessions.createSession(mario);
    clock.advance(45 * MINUTE);
    sessions.touch(session);
    clock.advance(45 * MINUTE);

    expect(sessions.validateSession(session.token)).toBe(session);
  });

  it('logout destroys the session', () => {
    const session = sessions.createSession(mario);

    expect(sessions.logout(session.token)).toBe(true);
    expect(sessions.validateSession(session.token)).toBeUndefined();
    expect(sessions.logout(session.token)).toBe(false);
  });

  it('revokeUser removes only that user, optionally keeping one token', () => {
    const keep = sessions.createSession(mario);
    const drop = sessions.createSession(mario);
    const other = sessions.createSession(luigi);

    expect(sessions.revokeUser('mario', keep.token)).toBe(1);
    expect(sessions.validateSession(keep.token)).toBe(keep);
    expect(sessions.validateSession(drop.token)).toBeUndefined();
    expect(sessions.validateSession(other.token)).toBe(other);
  });

  describe('dropping abandoned sessions', () => {
    it('keeps only live sessions when logins follow long idle periods', () => {
      for (let i = 0; i < 20; i++) {
        sessions.createSession(mario);
        clock.advance(61 * MINUTE);
      }
      const latest = sessions.createSession(luigi);

      expect(sessions.getSessionCount()).toBe(1);
      expect(sessions.validateSession(latest.token)).toBe(latest);
    });

    it('leaves sessions within the idle window untouched', () => {
      const early = sessions.createSession(mario);
      clock.advance(30 * MINUTE);
      sessions.createSession(luigi);

      expect(sessions.getSessionCount()).toBe(2);
      expect(sessions.validateSession(early.token)).toBe(early);
    });
  });
});
