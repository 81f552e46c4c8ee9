/**
 * Migration 001: Initial schema
 *
 * Metadata, the credential store and the audit log.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './types';

export class SchemaMigration implements Migration {
  readonly version = 1;
  readonly name = '001-schema';

  up(db: Database.Database): void {
    db.exec(`
      -- System metadata (key check sentinel, creation time)
      CREATE TABLE meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      -- Credential store. username uses BINARY collation: lookups are case-sensitive.
      CREATE TABLE users (
        username        TEXT PRIMARY KEY NOT NULL CHECK (length(username) > 0),
        display_name    TEXT,
        email           TEXT,
        password_hash   TEXT NOT NULL,
        salt            TEXT NOT NULL UNIQUE,
        role            TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('admin', 'user')),
        active          INTEGER NOT NULL DEFAULT 1,
        failed_attempts INTEGER NOT NULL DEFAULT 0 CHECK (failed_attempts >= 0),
        locked_until    TEXT,
        created_at      TEXT NOT NULL DEFAULT (datetime('now')),
        last_login_at   TEXT,
        updated_at      TEXT NOT NULL DEFAULT (datetime('now'))
      );
      CREATE INDEX idx_users_role ON users(role, active);

      -- Audit log (append-only)
      CREATE TABLE audit_events (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        event      TEXT NOT NULL,
        actor      TEXT,
        subject    TEXT,
        meta       TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
      CREATE INDEX idx_audit_created ON audit_events(created_at);
      CREATE INDEX idx_audit_subject ON audit_events(subject);
    `);
  }
}
