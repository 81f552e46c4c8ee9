/**
 * User SQL queries
 */

const TABLE = 'users';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (username, display_name, email, password_hash, salt, role, active,
                          failed_attempts, locked_until, created_at, last_login_at, updated_at)
    VALUES (@username, @displayName, @email, @passwordHash, @salt, @role, 1,
            0, NULL, @createdAt, NULL, @createdAt)`,

  selectByUsername: `SELECT * FROM ${TABLE} WHERE username = @username`,

  selectAll: `SELECT * FROM ${TABLE} ORDER BY username ASC`,

  count: `SELECT COUNT(*) as count FROM ${TABLE}`,

  countActiveAdmins: `SELECT COUNT(*) as count FROM ${TABLE} WHERE role = 'admin' AND active = 1`,

  updateRole: `
    UPDATE ${TABLE} SET role = @role, updated_at = @updatedAt
    WHERE username = @username`,

  updatePassword: `
    UPDATE ${TABLE}
    SET password_hash = @passwordHash, failed_attempts = 0, locked_until = NULL, updated_at = @updatedAt
    WHERE username = @username`,

  updateActive: `
    UPDATE ${TABLE} SET active = @active, updated_at = @updatedAt
    WHERE username = @username`,

  incrementFailedAttempts: `
    UPDATE ${TABLE} SET failed_attempts = failed_attempts + 1, updated_at = @updatedAt
    WHERE username = @username
    RETURNING failed_attempts`,

  setLockedUntil: `
    UPDATE ${TABLE} SET locked_until = @lockedUntil
    WHERE username = @username`,

  recordSuccess: `
    UPDATE ${TABLE}
    SET failed_attempts = 0, locked_until = NULL, last_login_at = @lastLoginAt, updated_at = @lastLoginAt
    WHERE username = @username`,

  unlock: `
    UPDATE ${TABLE} SET failed_attempts = 0, locked_until = NULL, updated_at = @updatedAt
    WHERE username = @username`,

  delete: `DELETE FROM ${TABLE} WHERE username = @username`,
} as const;
