/**
 * Audit SQL queries
 */

const TABLE = 'audit_events';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (event, actor, subject, meta, created_at)
    VALUES (@event, @actor, @subject, @meta, @createdAt)`,

  selectRecent: `SELECT * FROM ${TABLE} ORDER BY id DESC LIMIT @limit`,

  selectBySubject: `SELECT * FROM ${TABLE} WHERE subject = @subject ORDER BY id DESC LIMIT @limit`,

  count: `SELECT COUNT(*) as count FROM ${TABLE}`,

  pruneOldest: `
    DELETE FROM ${TABLE} WHERE id IN (
      SELECT id FROM ${TABLE} ORDER BY id ASC LIMIT @toDelete
    )`,
} as const;
