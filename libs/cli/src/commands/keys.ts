/**
 * Encryption key command
 */

import { Command } from 'commander';
import { ENV } from '@keyward/ipc';
import { KeyManager, Storage } from '@keyward/storage';
import { ensureDataDir, getDbPath, getKeyPath } from '@keyward/daemon';
import { resolveDataDir } from '../context';
import type { CliContext, GlobalOptions } from '../context';

/**
 * Resolve the encryption key ahead of first use and check it against the
 * store. Never prints the key itself.
 */
export function createInitKeyCommand(ctx: CliContext): Command {
  return new Command('init-key')
    .description('Create the encryption key if missing and verify it against the store')
    .action((_options: unknown, command: Command) => {
      const dataDir = resolveDataDir(ctx, command.optsWithGlobals<GlobalOptions>());
      ensureDataDir(dataDir);

      const keyManager = new KeyManager({ keyFile: getKeyPath(dataDir), externalKey: ctx.env[ENV.ENCRYPTION_KEY] });
      Storage.open({ dbPath: getDbPath(dataDir), keyManager }).close();

      switch (keyManager.getSource()) {
        case 'external':
          ctx.out.log(`✓ Using key from ${ENV.ENCRYPTION_KEY}`);
          break;
        case 'file':
          ctx.out.log(`✓ Key already present at ${keyManager.getKeyFile()}`);
          break;
        case 'generated':
          ctx.out.log(`✓ Generated new key at ${keyManager.getKeyFile()}`);
          break;
        default:
          throw new Error('Encryption key was not resolved');
      }
    });
}
