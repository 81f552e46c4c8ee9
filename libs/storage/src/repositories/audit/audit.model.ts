/**
 * Audit model: Row mapper and redaction utilities
 */

import type { AuditEvent, AuditEventType } from '@keyward/ipc';
import type { DbAuditEventRow } from '../../types';

// ---- Constants ----

export const REDACTED_FIELDS = ['password', 'secret', 'token', 'key', 'hash', 'salt'];
export const DEFAULT_MAX_EVENTS = 10_000;

const EVENT_TYPES: ReadonlySet<string> = new Set<AuditEventType>([
  'login_ok',
  'login_failed',
  'login_locked',
  'login_disabled',
  'account_locked',
  'logout',
  'bootstrap_admin',
  'user_created',
  'user_deleted',
  'user_role_changed',
  'user_password_changed',
  'user_activated',
  'user_deactivated',
  'user_unlocked',
]);

function isEventType(value: string): value is AuditEventType {
  return EVENT_TYPES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---- Row mapper ----

export function mapEvent(row: DbAuditEventRow): AuditEvent {
  if (!isEventType(row.event)) {
    throw new Error(`Unknown audit event type '${row.event}' (id ${row.id})`);
  }
  const meta: unknown = row.meta ? JSON.parse(row.meta) : undefined;
  return {
    id: row.id,
    event: row.event,
    actor: row.actor ?? undefined,
    subject: row.subject ?? undefined,
    meta: isRecord(meta) ? meta : undefined,
    createdAt: row.created_at,
  };
}

// ---- Redaction ----

/**
 * Redact sensitive fields from event metadata.
 */
export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (REDACTED_FIELDS.some((f) => key.toLowerCase().includes(f))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactValue(value);
    }
  }
  return result;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => redactValue(item));
  if (isRecord(value)) return redact(value);
  return value;
}
