/**
 * Internal DB row types
 *
 * These represent the raw SQLite row shapes (snake_case columns).
 * Domain types from @keyward/ipc use camelCase.
 */

export interface DbUserRow {
  username: string;
  display_name: string | null;
  email: string | null;
  /** AES-256-GCM ciphertext of the PBKDF2 digest */
  password_hash: string;
  salt: string;
  role: string;
  active: number;
  failed_attempts: number;
  locked_until: string | null;
  created_at: string;
  last_login_at: string | null;
  updated_at: string;
}

export interface DbAuditEventRow {
  id: number;
  event: string;
  actor: string | null;
  subject: string | null;
  meta: string | null;
  created_at: string;
}

export interface DbMetaRow {
  key: string;
  value: string;
}
