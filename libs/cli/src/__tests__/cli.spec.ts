import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CommanderError } from 'commander';
import type { Command } from 'commander';
import { loadConfig, openEngine } from '@keyward/daemon';
import type { Env } from '@keyward/daemon';
import { KeyResolutionError, LastAdminError, UserNotFoundError } from '@keyward/storage';
import { createProgram } from '../program';
import type { CliContext } from '../context';

jest.setTimeout(30_000);

describe('keyward CLI', () => {
  let dir: string;
  let env: Env;
  let lines: string[];
  let ctx: CliContext;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
    env = { KEYWARD_DATA_DIR: dir };
    lines = [];
    ctx = {
      env,
      out: { log: (line) => lines.push(line), error: (line) => lines.push(line) },
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<string[]> {
    lines = [];
    const program = createProgram(ctx);
    const silent = (cmd: Command) =>
      cmd.exitOverride().configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
    silent(program);
    program.commands.forEach(silent);
    await program.parseAsync(args, { from: 'user' });
    return lines;
  }

  async function runJson(...args: string[]): Promise<unknown> {
    const [output] = await run(...args, '--json');
    return JSON.parse(output);
  }

  async function seed(): Promise<void> {
    await run('create-user', 'root', '-p', 'admin-pass-1', '-r', 'admin', '-n', 'Root Admin');
    await run('create-user', 'mario', '-p', 'Sub4Life!');
  }

  describe('init-key', () => {
    it('generates a key file on first use and reuses it afterwards', async () => {
      const keyFile = path.join(dir, 'encryption.key');

      expect(await run('init-key')).toEqual([`✓ Generated new key at ${keyFile}`]);
      expect(fs.statSync(keyFile).mode & 0o777).toBe(0o600);
      expect(await run('init-key')).toEqual([`✓ Key already present at ${keyFile}`]);
    });

    it('reports an environment-provided key', async () => {
      env.KEYWARD_ENCRYPTION_KEY = Buffer.alloc(32, 3).toString('base64');

      expect(await run('init-key')).toEqual(['✓ Using key from KEYWARD_ENCRYPTION_KEY']);
      expect(fs.existsSync(path.join(dir, 'encryption.key'))).toBe(false);
    });

    it('fails when the key does not match the existing store', async () => {
      await run('init-key');
      env.KEYWARD_ENCRYPTION_KEY = Buffer.alloc(32, 3).toString('base64');

      await expect(run('init-key')).rejects.toThrow(KeyResolutionError);
    });

    it('honours --data-dir over the environment', async () => {
      const other = path.join(dir, 'other');

      expect(await run('--data-dir', other, 'init-key')).toEqual([
        `✓ Generated new key at ${path.join(other, 'encryption.key')}`,
      ]);
    });
  });

  describe('user administration', () => {
    beforeEach(seed);

    it('reports created users', async () => {
      expect(await run('create-user', 'luigi', '-p', 'Green4Ever', '-r', 'admin')).toEqual(["✓ Created admin 'luigi'"]);
    });

    it('lists users as a table', async () => {
      expect(await run('list-users')).toEqual([
        'USERNAME  ROLE   STATUS  DISPLAY NAME  LAST LOGIN',
        'mario     user   active                never',
        'root      admin  active  Root Admin    never',
      ]);
    });

    it('lists users as JSON without secrets', async () => {
      const users = await runJson('list-users');

      expect(users).toEqual([
        expect.objectContaining({ username: 'mario', role: 'user', active: true, locked: false }),
        expect.objectContaining({ username: 'root', role: 'admin', displayName: 'Root Admin' }),
      ]);
      const [output] = await run('list-users', '--json');
      expect(output).not.toMatch(/passwordHash|password_hash|salt/);
    });

    it('rejects a duplicate username', async () => {
      await expect(run('create-user', 'mario', '-p', 'Another1!')).rejects.toThrow("User 'mario' already exists");
    });

    it('rejects an invalid password', async () => {
      await expect(run('create-user', 'peach', '-p', 'short')).rejects.toMatchObject({ code: 'INVALID_INPUT' });
    });

    it('rejects an unknown role before touching the store', async () => {
      await expect(run('create-user', 'peach', '-p', 'Castle123', '-r', 'root')).rejects.toBeInstanceOf(CommanderError);
      expect(await run('list-users')).toHaveLength(3);
    });

    it('requires a password', async () => {
      await expect(run('create-user', 'peach')).rejects.toMatchObject({
        code: 'commander.missingMandatoryOptionValue',
      });
    });

    it('changes a role', async () => {
      expect(await run('change-role', 'mario', 'admin')).toEqual(["✓ 'mario' is now admin"]);
      expect(await runJson('list-users')).toEqual([
        expect.objectContaining({ username: 'mario', role: 'admin' }),
        expect.objectContaining({ username: 'root', role: 'admin' }),
      ]);
    });

    it('refuses to demote the last active admin', async () => {
      await expect(run('change-role', 'root', 'user')).rejects.toThrow(LastAdminError);
    });

    it('deactivates and reactivates a user', async () => {
      expect(await run('deactivate', 'mario')).toEqual(["✓ Deactivated 'mario'"]);
      expect(await run('list-users')).toContain('mario     user   disabled                never');

      expect(await run('activate', 'mario')).toEqual(["✓ Activated 'mario'"]);
      expect(await runJson('list-users')).toEqual([
        expect.objectContaining({ username: 'mario', active: true }),
        expect.objectContaining({ username: 'root' }),
      ]);
    });

    it('reports an unknown user', async () => {
      await expect(run('activate', 'ghost')).rejects.toThrow(UserNotFoundError);
      await expect(run('unlock', 'ghost')).rejects.toThrow("User 'ghost' not found");
    });

    it('unlocks a locked-out user', async () => {
      const engine = openEngine({ dataDir: dir, config: loadConfig(dir, env), env });
      try {
        for (let i = 0; i < 5; i++) engine.login('mario', 'wrong-password');
      } finally {
        engine.close();
      }
      expect(await runJson('list-users')).toEqual([
        expect.objectContaining({ username: 'mario', locked: true, failedAttempts: 5 }),
        expect.objectContaining({ username: 'root' }),
      ]);

      expect(await run('unlock', 'mario')).toEqual(["✓ Unlocked 'mario'"]);
      expect(await runJson('list-users')).toEqual([
        expect.objectContaining({ username: 'mario', locked: false, failedAttempts: 0 }),
        expect.objectContaining({ username: 'root' }),
      ]);
    });

    it('resets a password', async () => {
      expect(await run('change-password', 'mario', '-p', 'NewPass123')).toEqual(["✓ Password changed for 'mario'"]);

      const engine = openEngine({ dataDir: dir, config: loadConfig(dir, env), env });
      try {
        expect(engine.login('mario', 'Sub4Life!')).toMatchObject({ success: false, code: 'INVALID_CREDENTIALS' });
        expect(engine.login('mario', 'NewPass123')).toMatchObject({ success: true });
      } finally {
        engine.close();
      }
    });

    it('deletes a user only with --yes', async () => {
      await expect(run('delete-user', 'mario')).rejects.toThrow("Refusing to delete 'mario' without --yes");
      expect(await run('delete-user', 'mario', '--yes')).toEqual(["✓ Deleted 'mario'"]);
      expect(await runJson('list-users')).toEqual([expect.objectContaining({ username: 'root' })]);
    });
  });

  describe('audit', () => {
    beforeEach(seed);

    it('prints events newest first', async () => {
      await run('deactivate', 'mario');

      const output = await run('audit');
      expect(output).toHaveLength(3);
      expect(output[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z {2}user_deactivated {2}@operator {2}mario$/);
      expect(output[1]).toMatch(/ {2}user_created {2}@operator {2}mario$/);
      expect(output[2]).toMatch(/ {2}user_created {2}@operator {2}root$/);
    });

    it('filters by user and limit', async () => {
      await run('deactivate', 'mario');

      expect(await runJson('audit', '--user', 'mario', '--limit', '1')).toEqual([
        expect.objectContaining({ event: 'user_deactivated', actor: '@operator', subject: 'mario' }),
      ]);
    });

    it('rejects a non-positive limit', async () => {
      await expect(run('audit', '--limit', '0')).rejects.toMatchObject({ code: 'commander.invalidArgument' });
    });
  });
});
