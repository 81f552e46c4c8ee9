/**
 * User repository: Credential store
 *
 * Password digests are PBKDF2 with a per-user salt, then AES-256-GCM
 * encrypted with the store key. Every mutation is a single statement or
 * a single transaction.
 */

import type { Role, UserRecord } from '@keyward/ipc';
import type { Clock } from '@keyward/ipc';
import type Database from 'better-sqlite3';
import type { DbUserRow } from '../../types';
import { generateSalt, hashPassword } from '../../crypto';
import { DuplicateUsernameError, UserNotFoundError, errorCode } from '../../errors';
import { BaseRepository } from '../base.repository';
import { CreateUserSchema, PasswordSchema, RoleSchema, UsernameSchema } from './users.schema';
import type { CreateUserInput, FailedAttemptResult, LockoutPolicy } from './users.schema';
import { mapUser } from './users.model';
import type { StoredCredentials } from './users.model';
import { Q } from './users.query';

type UsernameParams = { username: string };

export class UserRepository extends BaseRepository {
  constructor(
    db: Database.Database,
    getEncryptionKey: () => Buffer,
    clock: Clock,
    private readonly lockout: LockoutPolicy,
  ) {
    super(db, getEncryptionKey, clock);
  }

  /**
   * Create a user with a fresh salt. Existing usernames are never overwritten.
   */
  create(input: CreateUserInput): UserRecord {
    const data = this.validate(CreateUserSchema, input);
    const salt = generateSalt();
    const passwordHash = this.encrypt(hashPassword(data.password, salt));
    const now = this.now();

    this.guard('create', () => {
      try {
        this.db.prepare(Q.insert).run({
          username: data.username,
          displayName: data.displayName ?? null,
          email: data.email ?? null,
          passwordHash,
          salt,
          role: data.role,
          createdAt: now,
        });
      } catch (err) {
        if (errorCode(err) === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
          throw new DuplicateUsernameError(data.username);
        }
        throw err;
      }
    });

    return {
      username: data.username,
      displayName: data.displayName,
      email: data.email,
      role: data.role,
      active: true,
      failedAttempts: 0,
      createdAt: now,
    };
  }

  /**
   * Exact, case-sensitive lookup.
   */
  find(username: string): UserRecord | null {
    const row = this.getRow(username);
    return row ? mapUser(row) : null;
  }

  /**
   * Salt and decrypted digest for credential verification.
   */
  getCredentials(username: string): StoredCredentials | null {
    const row = this.getRow(username);
    if (!row) return null;
    return { salt: row.salt, passwordHash: this.decrypt(row.password_hash) };
  }

  updateRole(username: string, role: Role): void {
    const parsed = this.validate(RoleSchema, role);
    this.runForUser('updateRole', Q.updateRole, { username, role: parsed, updatedAt: this.now() });
  }

  /**
   * Re-hash with the user's existing salt and re-encrypt. Clears any lockout.
   */
  setPassword(username: string, newPassword: string): void {
    const password = this.validate(PasswordSchema, newPassword);

    this.guard('setPassword', () => {
      this.db.transaction(() => {
        const row = this.getRow(username);
        if (!row) throw new UserNotFoundError(username);
        const passwordHash = this.encrypt(hashPassword(password, row.salt));
        this.db.prepare(Q.updatePassword).run({ username, passwordHash, updatedAt: this.now() });
      })();
    });
  }

  setActive(username: string, active: boolean): void {
    this.runForUser('setActive', Q.updateActive, { username, active: active ? 1 : 0, updatedAt: this.now() });
  }

  /**
   * Increment the failure counter; at the threshold, lock the account.
   * Counter and lock are written in one transaction.
   */
  recordFailedAttempt(username: string): FailedAttemptResult {
    return this.guard('recordFailedAttempt', () =>
      this.db.transaction((): FailedAttemptResult => {
        const now = this.clock.now();
        const row = this.db
          .prepare<{ username: string; updatedAt: string }, { failed_attempts: number }>(Q.incrementFailedAttempts)
          .get({ username, updatedAt: now.toISOString() });
        if (!row) throw new UserNotFoundError(username);

        const failedAttempts = row.failed_attempts;
        if (failedAttempts < this.lockout.maxFailedAttempts) {
          return { failedAttempts };
        }

        const lockedUntil = new Date(now.getTime() + this.lockout.lockoutDurationMs).toISOString();
        this.db.prepare(Q.setLockedUntil).run({ username, lockedUntil });
        return { failedAttempts, lockedUntil };
      })(),
    );
  }

  /**
   * Reset the failure counter, clear the lock and stamp last_login_at.
   */
  recordSuccess(username: string): void {
    this.runForUser('recordSuccess', Q.recordSuccess, { username, lastLoginAt: this.now() });
  }

  /**
   * Clear lock and failure counter unconditionally.
   */
  unlock(username: string): void {
    this.runForUser('unlock', Q.unlock, { username, updatedAt: this.now() });
  }

  /**
   * All users, sorted by username.
   */
  listAll(): UserRecord[] {
    return this.guard('listAll', () =>
      this.db.prepare<[], DbUserRow>(Q.selectAll).all().map(mapUser),
    );
  }

  delete(username: string): void {
    this.runForUser('delete', Q.delete, { username });
  }

  count(): number {
    return this.guard('count', () => this.db.prepare<[], { count: number }>(Q.count).get()?.count ?? 0);
  }

  countActiveAdmins(): number {
    return this.guard('countActiveAdmins', () =>
      this.db.prepare<[], { count: number }>(Q.countActiveAdmins).get()?.count ?? 0,
    );
  }

  private getRow(username: string): DbUserRow | null {
    if (!UsernameSchema.safeParse(username).success) return null;
    return this.guard('find', () =>
      this.db.prepare<UsernameParams, DbUserRow>(Q.selectByUsername).get({ username }) ?? null,
    );
  }

  /**
   * Run a single-row UPDATE/DELETE, throwing UserNotFoundError when no row matched.
   */
  private runForUser(operation: string, sql: string, params: UsernameParams & Record<string, unknown>): void {
    const result = this.guard(operation, () => this.db.prepare(sql).run(params));
    if (result.changes === 0) throw new UserNotFoundError(params.username);
  }
}
