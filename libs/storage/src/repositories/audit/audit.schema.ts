/**
 * Audit schemas: Storage-specific input and option types
 */

import type { AuditEventType } from '@keyward/ipc';

export interface RecordAuditInput {
  event: AuditEventType;
  actor?: string;
  subject?: string;
  meta?: Record<string, unknown>;
}

export interface AuditListOptions {
  limit?: number;
  subject?: string;
}
