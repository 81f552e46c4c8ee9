/**
 * Credential engine
 *
 * The authentication and administration surface consumed by the HTTP API
 * and the CLI. Owns the storage handle, the authenticator and the session
 * table; every mutation passes through `authorize` before it reaches the
 * store.
 */

import type { z } from 'zod';
import type {
  AuditEvent,
  AuthConfig,
  AuthFailure,
  Capability,
  Clock,
  CreateUserInput,
  Identity,
  Logger,
  Role,
  UserRecord,
  UserSummary,
} from '@keyward/ipc';
import {
  DEFAULT_ADMIN_DISPLAY_NAME,
  DEFAULT_ADMIN_USERNAME,
  DEFAULT_AUTH_CONFIG,
  PasswordSchema,
  RoleSchema,
  noopLogger,
  systemClock,
} from '@keyward/ipc';
import type { Storage } from '@keyward/storage';
import { LastAdminError, UserNotFoundError, ValidationError, toSummary } from '@keyward/storage';
import { Authenticator } from './auth/authenticator';
import { SessionManager } from './auth/session';
import * as access from './auth/access';
import { AccountDisabledError, AccountLockedError } from './errors';

export type LoginResult = { success: true; token: string; identity: Identity } | AuthFailure;

export interface CredentialEngineOptions {
  storage: Storage;
  auth?: AuthConfig;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Identity used for operator actions from the CLI. Never a stored user.
 */
export const OPERATOR_IDENTITY: Identity = {
  username: '@operator',
  role: 'admin',
  displayName: 'Operator',
};

export class CredentialEngine {
  readonly sessions: SessionManager;
  private readonly storage: Storage;
  private readonly authenticator: Authenticator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CredentialEngineOptions) {
    const auth = options.auth ?? DEFAULT_AUTH_CONFIG;
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
    this.sessions = new SessionManager(auth.sessionTimeoutMs, this.clock);
    this.authenticator = new Authenticator(this.storage, this.clock, this.logger);
  }

  // ---- Authentication & sessions ----

  /**
   * Verify credentials and open a session on success.
   */
  login(username: string, password: string): LoginResult {
    const result = this.authenticator.authenticate(username, password);
    if (!result.success) return result;

    const session = this.sessions.createSession(result.identity);
    return { success: true, token: session.token, identity: result.identity };
  }

  logout(token: string): boolean {
    const session = this.sessions.validateSession(token);
    const removed = this.sessions.logout(token);
    if (session) {
      this.storage.audit.record({ event: 'logout', actor: session.username, subject: session.username });
    }
    return removed;
  }

  /**
   * Identity behind a session token, or null when the token is unknown or
   * idle past the timeout. A valid lookup counts as activity.
   */
  currentIdentity(token: string): Identity | null {
    const session = this.sessions.validateSession(token);
    if (!session) return null;
    this.sessions.touch(session);
    return { username: session.username, role: session.role, displayName: session.displayName };
  }

  // ---- Capability queries ----

  authorize(identity: Identity | null | undefined, capability: Capability): Identity {
    return access.authorize(identity, capability);
  }

  capabilities(identity: Identity): Capability[] {
    return [...access.capabilities(identity.role)];
  }

  isAdmin(identity: Identity | null | undefined): boolean {
    return access.isAdmin(identity);
  }

  canWrite(identity: Identity | null | undefined): boolean {
    return access.canWrite(identity);
  }

  canRead(identity: Identity | null | undefined): boolean {
    return access.canRead(identity);
  }

  // ---- Administration ----

  createUser(actor: Identity, input: CreateUserInput): UserRecord {
    this.authorize(actor, 'admin');
    const user = this.storage.users.create(input);
    this.storage.audit.record({
      event: 'user_created',
      actor: actor.username,
      subject: user.username,
      meta: { role: user.role },
    });
    this.logger.info(`[admin] ${actor.username} created user '${user.username}' (${user.role})`);
    return user;
  }

  getUser(actor: Identity, username: string): UserSummary {
    this.authorize(actor, 'admin');
    return toSummary(this.requireUser(username), this.clock.now());
  }

  listUsers(actor: Identity): UserSummary[] {
    this.authorize(actor, 'admin');
    const now = this.clock.now();
    return this.storage.users.listAll().map((user) => toSummary(user, now));
  }

  /**
   * Administrative password reset. Clears the lockout and ends the user's sessions.
   */
  changePassword(actor: Identity, username: string, newPassword: string): void {
    this.authorize(actor, 'admin');
    this.storage.users.setPassword(username, newPassword);
    this.sessions.revokeUser(username);
    this.storage.audit.record({ event: 'user_password_changed', actor: actor.username, subject: username });
    this.logger.info(`[admin] ${actor.username} reset the password of '${username}'`);
  }

  /**
   * Self-service password change. The current password goes through the
   * same failure counter and lockout as login. Other sessions of the user
   * are ended.
   */
  changeOwnPassword(token: string, currentPassword: string, newPassword: string): void {
    const actor = this.authorize(this.currentIdentity(token), 'read');
    this.parse(PasswordSchema, newPassword);

    const check = this.authenticator.verifyCurrentPassword(actor.username, currentPassword);
    if (!check.success) {
      switch (check.code) {
        case 'ACCOUNT_LOCKED':
          throw new AccountLockedError(actor.username, check.remainingMs);
        case 'ACCOUNT_DISABLED':
          throw new AccountDisabledError(actor.username);
        case 'INVALID_CREDENTIALS':
          throw new ValidationError('Current password is incorrect');
      }
    }

    this.storage.users.setPassword(actor.username, newPassword);
    this.sessions.revokeUser(actor.username, token);
    this.storage.audit.record({ event: 'user_password_changed', actor: actor.username, subject: actor.username });
  }

  /**
   * The role is validated before the user lookup and the last-admin guard.
   */
  changeRole(actor: Identity, username: string, role: string): void {
    this.authorize(actor, 'admin');
    const next = this.parse(RoleSchema, role);
    const user = this.requireUser(username);
    if (user.role === next) return;
    if (next !== 'admin') this.assertNotLastAdmin(user);

    this.storage.users.updateRole(username, next);
    this.sessions.revokeUser(username);
    this.storage.audit.record({
      event: 'user_role_changed',
      actor: actor.username,
      subject: username,
      meta: { from: user.role, to: next },
    });
    this.logger.info(`[admin] ${actor.username} changed role of '${username}' to ${next}`);
  }

  activate(actor: Identity, username: string): void {
    this.authorize(actor, 'admin');
    this.storage.users.setActive(username, true);
    this.storage.audit.record({ event: 'user_activated', actor: actor.username, subject: username });
    this.logger.info(`[admin] ${actor.username} activated '${username}'`);
  }

  deactivate(actor: Identity, username: string): void {
    this.authorize(actor, 'admin');
    this.assertNotLastAdmin(this.requireUser(username));

    this.storage.users.setActive(username, false);
    this.sessions.revokeUser(username);
    this.storage.audit.record({ event: 'user_deactivated', actor: actor.username, subject: username });
    this.logger.info(`[admin] ${actor.username} deactivated '${username}'`);
  }

  unlock(actor: Identity, username: string): void {
    this.authorize(actor, 'admin');
    this.storage.users.unlock(username);
    this.storage.audit.record({ event: 'user_unlocked', actor: actor.username, subject: username });
    this.logger.info(`[admin] ${actor.username} unlocked '${username}'`);
  }

  deleteUser(actor: Identity, username: string): void {
    this.authorize(actor, 'admin');
    this.assertNotLastAdmin(this.requireUser(username));

    this.storage.users.delete(username);
    this.sessions.revokeUser(username);
    this.storage.audit.record({ event: 'user_deleted', actor: actor.username, subject: username });
    this.logger.info(`[admin] ${actor.username} deleted '${username}'`);
  }

  listAudit(actor: Identity, limit?: number, subject?: string): AuditEvent[] {
    this.authorize(actor, 'admin');
    return this.storage.audit.list({ limit, subject });
  }

  // ---- Lifecycle ----

  /**
   * Create the default admin when the store has no users. Returns true when
   * an account was created.
   */
  bootstrapAdmin(password: string | undefined): boolean {
    if (this.storage.users.count() > 0) return false;

    if (!password) {
      this.logger.warn('[bootstrap] Credential store is empty and no admin password is configured; no one can log in');
      return false;
    }

    this.storage.users.create({
      username: DEFAULT_ADMIN_USERNAME,
      password,
      role: 'admin',
      displayName: DEFAULT_ADMIN_DISPLAY_NAME,
    });
    this.storage.audit.record({ event: 'bootstrap_admin', subject: DEFAULT_ADMIN_USERNAME });
    this.logger.warn(`[bootstrap] Created default admin '${DEFAULT_ADMIN_USERNAME}'; change its password`);
    return true;
  }

  close(): void {
    this.sessions.clearAllSessions();
    this.storage.close();
  }

  private parse<T>(schema: z.ZodType<T>, value: unknown): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ValidationError(
        `Validation failed: ${result.error.issues.map((i) => i.message).join('; ')}`,
        result.error.issues,
      );
    }
    return result.data;
  }

  private requireUser(username: string): UserRecord {
    const user = this.storage.users.find(username);
    if (!user) throw new UserNotFoundError(username);
    return user;
  }

  private assertNotLastAdmin(user: UserRecord): void {
    if (user.role === 'admin' && user.active && this.storage.users.countActiveAdmins() <= 1) {
      throw new LastAdminError(user.username);
    }
  }
}
