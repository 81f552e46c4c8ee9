/**
 * Plain-text formatting for command output
 */

import type { AuditEvent, UserSummary } from '@keyward/ipc';

function table(header: string[], rows: string[][]): string[] {
  const widths = header.map((title, i) => Math.max(title.length, ...rows.map((row) => row[i].length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, i) => cell.padEnd(widths[i]))
      .join('  ')
      .trimEnd();
  return [line(header), ...rows.map(line)];
}

function userStatus(user: UserSummary): string {
  if (!user.active) return 'disabled';
  if (user.locked) return 'locked';
  return 'active';
}

export function formatUsers(users: UserSummary[]): string[] {
  if (users.length === 0) return ['No users'];
  return table(
    ['USERNAME', 'ROLE', 'STATUS', 'DISPLAY NAME', 'LAST LOGIN'],
    users.map((user) => [user.username, user.role, userStatus(user), user.displayName ?? '', user.lastLoginAt ?? 'never']),
  );
}

export function formatAudit(events: AuditEvent[]): string[] {
  if (events.length === 0) return ['No audit events'];
  return events.map((event) => [event.createdAt, event.event, event.actor ?? '-', event.subject ?? '-'].join('  '));
}
