/**
 * Audit repository: Append-only event log with pruning and redaction
 */

import type { AuditEvent } from '@keyward/ipc';
import type { DbAuditEventRow } from '../../types';
import { BaseRepository } from '../base.repository';
import type { AuditListOptions, RecordAuditInput } from './audit.schema';
import { mapEvent, redact, DEFAULT_MAX_EVENTS } from './audit.model';
import { Q } from './audit.query';

export class AuditRepository extends BaseRepository {
  /**
   * Append an audit event. Secret-looking metadata keys are redacted.
   */
  record(input: RecordAuditInput): AuditEvent {
    const now = this.now();
    const meta = input.meta ? redact(input.meta) : undefined;

    const result = this.guard('audit.record', () =>
      this.db.prepare(Q.insert).run({
        event: input.event,
        actor: input.actor ?? null,
        subject: input.subject ?? null,
        meta: meta ? JSON.stringify(meta) : null,
        createdAt: now,
      }),
    );

    return {
      id: Number(result.lastInsertRowid),
      event: input.event,
      actor: input.actor,
      subject: input.subject,
      meta,
      createdAt: now,
    };
  }

  /**
   * Most recent events first.
   */
  list(opts?: AuditListOptions): AuditEvent[] {
    const limit = opts?.limit ?? 200;
    return this.guard('audit.list', () => {
      const rows = opts?.subject
        ? this.db.prepare<{ subject: string; limit: number }, DbAuditEventRow>(Q.selectBySubject).all({ subject: opts.subject, limit })
        : this.db.prepare<{ limit: number }, DbAuditEventRow>(Q.selectRecent).all({ limit });
      return rows.map(mapEvent);
    });
  }

  count(): number {
    return this.guard('audit.count', () => this.db.prepare<[], { count: number }>(Q.count).get()?.count ?? 0);
  }

  /**
   * Prune old events, keeping at most `maxEvents`.
   */
  prune(maxEvents: number = DEFAULT_MAX_EVENTS): number {
    const total = this.count();
    if (total <= maxEvents) return 0;

    const toDelete = total - maxEvents;
    return this.guard('audit.prune', () => this.db.prepare(Q.pruneOldest).run({ toDelete }).changes);
  }
}
