import * as path from 'node:path';
import { Storage } from '../../../storage';
import { KeyManager } from '../../../key-manager';
import { verifyPassword } from '../../../crypto';
import { DuplicateUsernameError, UserNotFoundError, ValidationError } from '../../../errors';
import { tmpDir, removeDir, TestClock, TEST_KEY } from '../../../__tests__/helpers';

const FIFTEEN_MINUTES = 15 * 60 * 1000;

describe('UserRepository', () => {
  let dir: string;
  let storage: Storage;
  let clock: TestClock;

  beforeEach(() => {
    dir = tmpDir('users-test-');
    clock = new TestClock();
    storage = Storage.open({
      dbPath: path.join(dir, 'keyward.db'),
      keyManager: new KeyManager({ keyFile: path.join(dir, 'encryption.key'), externalKey: TEST_KEY.toString('base64') }),
      clock,
      lockout: { maxFailedAttempts: 5, lockoutDurationMs: FIFTEEN_MINUTES },
    });
  });

  afterEach(() => {
    storage.close();
    removeDir(dir);
  });

  describe('create / find', () => {
    it('creates an active user with default role and zeroed counters', () => {
      const created = storage.users.create({ username: 'mario', password: 'Sub4Life!', displayName: 'Mario Rossi' });

      expect(created).toEqual({
        username: 'mario',
        displayName: 'Mario Rossi',
        email: undefined,
        role: 'user',
        active: true,
        failedAttempts: 0,
        createdAt: '2024-03-01T12:00:00.000Z',
      });
      expect(storage.users.find('mario')).toEqual({
        username: 'mario',
        displayName: 'Mario Rossi',
        email: undefined,
        role: 'user',
        active: true,
        failedAttempts: 0,
        lockedUntil: undefined,
        createdAt: '2024-03-01T12:00:00.000Z',
        lastLoginAt: undefined,
      });
    });

    it('stores email and admin role', () => {
      storage.users.create({ username: 'root', password: 'password1', role: 'admin', email: 'root@example.com' });
      const user = storage.users.find('root');
      expect(user?.role).toBe('admin');
      expect(user?.email).toBe('root@example.com');
    });

    it('stores a digest that verifies against the per-user salt', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      const creds = storage.users.getCredentials('mario');

      expect(creds).not.toBeNull();
      if (!creds) return;
      expect(verifyPassword('Sub4Life!', creds.salt, creds.passwordHash)).toBe(true);
      expect(verifyPassword('wrong', creds.salt, creds.passwordHash)).toBe(false);
    });

    it('never reuses a salt across users', () => {
      storage.users.create({ username: 'a', password: 'same-password' });
      storage.users.create({ username: 'b', password: 'same-password' });

      expect(storage.users.getCredentials('a')?.salt).not.toBe(storage.users.getCredentials('b')?.salt);
    });

    it('rejects a duplicate username without touching the existing record', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!', role: 'user' });
      const before = storage.users.getCredentials('mario');

      expect(() => storage.users.create({ username: 'mario', password: 'other-pass', role: 'admin' }))
        .toThrow(DuplicateUsernameError);
      expect(storage.users.find('mario')?.role).toBe('user');
      expect(storage.users.getCredentials('mario')).toEqual(before);
    });

    it('matches usernames case-sensitively', () => {
      storage.users.create({ username: 'Mario', password: 'Sub4Life!' });

      expect(storage.users.find('mario')).toBeNull();
      expect(storage.users.find('Mario')?.username).toBe('Mario');
      expect(() => storage.users.create({ username: 'mario', password: 'Sub4Life!' })).not.toThrow();
      expect(storage.users.count()).toBe(2);
    });

    it.each([
      [{ username: '', password: 'Sub4Life!' }],
      [{ username: ' mario', password: 'Sub4Life!' }],
      [{ username: 'mario', password: 'short' }],
      [{ username: 'mario', password: 'Sub4Life!', email: 'not-an-email' }],
    ])('rejects invalid input %j', (input) => {
      expect(() => storage.users.create(input)).toThrow(ValidationError);
      expect(storage.users.count()).toBe(0);
    });

    it('returns null for unknown users', () => {
      expect(storage.users.find('ghost')).toBeNull();
      expect(storage.users.getCredentials('ghost')).toBeNull();
    });
  });

  describe('recordFailedAttempt', () => {
    beforeEach(() => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
    });

    it('increments by one per call and locks at the threshold', () => {
      for (let i = 1; i <= 4; i++) {
        expect(storage.users.recordFailedAttempt('mario')).toEqual({ failedAttempts: i });
      }

      expect(storage.users.recordFailedAttempt('mario')).toEqual({
        failedAttempts: 5,
        lockedUntil: '2024-03-01T12:15:00.000Z',
      });
      expect(storage.users.find('mario')?.lockedUntil).toBe('2024-03-01T12:15:00.000Z');
    });

    it('throws UserNotFoundError for unknown users', () => {
      expect(() => storage.users.recordFailedAttempt('ghost')).toThrow(UserNotFoundError);
    });
  });

  describe('recordSuccess', () => {
    it('resets the counter, clears the lock and stamps last_login_at', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      for (let i = 0; i < 5; i++) storage.users.recordFailedAttempt('mario');
      clock.advance(60_000);

      storage.users.recordSuccess('mario');

      const user = storage.users.find('mario');
      expect(user?.failedAttempts).toBe(0);
      expect(user?.lockedUntil).toBeUndefined();
      expect(user?.lastLoginAt).toBe('2024-03-01T12:01:00.000Z');
    });
  });

  describe('unlock', () => {
    it('clears lock and counter', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      for (let i = 0; i < 5; i++) storage.users.recordFailedAttempt('mario');

      storage.users.unlock('mario');

      const user = storage.users.find('mario');
      expect(user?.failedAttempts).toBe(0);
      expect(user?.lockedUntil).toBeUndefined();
    });

    it('is a no-op on an unlocked account', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      storage.users.unlock('mario');
      expect(storage.users.find('mario')?.failedAttempts).toBe(0);
    });
  });

  describe('setPassword', () => {
    it('re-hashes with the existing salt and clears the lock', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      const saltBefore = storage.users.getCredentials('mario')?.salt;
      for (let i = 0; i < 5; i++) storage.users.recordFailedAttempt('mario');

      storage.users.setPassword('mario', 'NewPass99');

      const creds = storage.users.getCredentials('mario');
      expect(creds?.salt).toBe(saltBefore);
      expect(creds && verifyPassword('NewPass99', creds.salt, creds.passwordHash)).toBe(true);
      expect(creds && verifyPassword('Sub4Life!', creds.salt, creds.passwordHash)).toBe(false);
      expect(storage.users.find('mario')?.failedAttempts).toBe(0);
      expect(storage.users.find('mario')?.lockedUntil).toBeUndefined();
    });

    it('validates the new password', () => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
      expect(() => storage.users.setPassword('mario', 'short')).toThrow(ValidationError);
    });
  });

  describe('not found', () => {
    it.each([
      ['updateRole', () => storage.users.updateRole('ghost', 'admin')],
      ['setPassword', () => storage.users.setPassword('ghost', 'password1')],
      ['setActive', () => storage.users.setActive('ghost', false)],
      ['unlock', () => storage.users.unlock('ghost')],
      ['delete', () => storage.users.delete('ghost')],
    ])('%s throws UserNotFoundError', (_name, op) => {
      expect(op).toThrow(UserNotFoundError);
    });
  });

  describe('updateRole / setActive / delete', () => {
    beforeEach(() => {
      storage.users.create({ username: 'mario', password: 'Sub4Life!' });
    });

    it('changes the role', () => {
      storage.users.updateRole('mario', 'admin');
      expect(storage.users.find('mario')?.role).toBe('admin');
      expect(storage.users.countActiveAdmins()).toBe(1);
    });

    it('toggles active', () => {
      storage.users.setActive('mario', false);
      expect(storage.users.find('mario')?.active).toBe(false);
      storage.users.setActive('mario', true);
      expect(storage.users.find('mario')?.active).toBe(true);
    });

    it('deletes the record', () => {
      storage.users.delete('mario');
      expect(storage.users.find('mario')).toBeNull();
    });
  });

  describe('listAll', () => {
    it('returns users sorted by username', () => {
      storage.users.create({ username: 'zed', password: 'password1' });
      storage.users.create({ username: 'bob', password: 'password1' });
      storage.users.create({ username: 'Alice', password: 'password1' });

      expect(storage.users.listAll().map((u) => u.username)).toEqual(['Alice', 'bob', 'zed']);
    });
  });
});
