/**
 * Audit log types
 */

export type AuditEventType =
  | 'login_ok'
  | 'login_failed'
  | 'login_locked'
  | 'login_disabled'
  | 'account_locked'
  | 'logout'
  | 'bootstrap_admin'
  | 'user_created'
  | 'user_deleted'
  | 'user_role_changed'
  | 'user_password_changed'
  | 'user_activated'
  | 'user_deactivated'
  | 'user_unlocked';

export interface AuditEvent {
  id: number;
  event: AuditEventType;
  /** Username of the caller, absent for anonymous login attempts */
  actor?: string;
  /** Username the event is about */
  subject?: string;
  meta?: Record<string, unknown>;
  createdAt: string;
}
