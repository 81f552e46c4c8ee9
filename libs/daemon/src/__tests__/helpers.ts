import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AuthConfig, Clock } from '@keyward/ipc';
import { DEFAULT_AUTH_CONFIG } from '@keyward/ipc';
import { KeyManager, Storage } from '@keyward/storage';
import { CredentialEngine } from '../engine';

export const MINUTE = 60 * 1000;

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

export interface TestEngine {
  engine: CredentialEngine;
  storage: Storage;
  clock: TestClock;
  dir: string;
  cleanup(): void;
}

export function createTestEngine(auth: AuthConfig = DEFAULT_AUTH_CONFIG): TestEngine {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'engine-test-'));
  const clock = new TestClock();
  const storage = Storage.open({
    dbPath: path.join(dir, 'keyward.db'),
    keyManager: new KeyManager({
      keyFile: path.join(dir, 'encryption.key'),
      externalKey: Buffer.alloc(32, 9).toString('base64'),
    }),
    clock,
    lockout: { maxFailedAttempts: auth.maxFailedAttempts, lockoutDurationMs: auth.lockoutDurationMs },
  });
  const engine = new CredentialEngine({ storage, auth, clock });

  return {
    engine,
    storage,
    clock,
    dir,
    cleanup() {
      engine.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
