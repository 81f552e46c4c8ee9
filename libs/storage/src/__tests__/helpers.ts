import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Clock } from '@keyward/ipc';

export const TEST_KEY = Buffer.alloc(32, 7);

export function tmpDir(prefix = 'storage-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Manually advanced clock
 */
export class TestClock implements Clock {
  constructor(private current: number = Date.parse('2024-03-01T12:00:00.000Z')) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
