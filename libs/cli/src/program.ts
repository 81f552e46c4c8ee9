/**
 * CLI program definition
 */

import { Command } from 'commander';
import {
  createCreateUserCommand,
  createListUsersCommand,
  createChangePasswordCommand,
  createChangeRoleCommand,
  createActivateCommand,
  createDeactivateCommand,
  createUnlockCommand,
  createDeleteUserCommand,
  createAuditCommand,
  createInitKeyCommand,
} from './commands/index';
import { defaultContext } from './context';
import type { CliContext } from './context';

export const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(ctx: CliContext = defaultContext()): Command {
  const program = new Command();

  program
    .name('keyward')
    .description('Keyward - credential store administration')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-d, --data-dir <dir>', 'Data directory (default: $KEYWARD_DATA_DIR or ~/.keyward)')
    .addHelpText(
      'after',
      `
Examples:
  $ keyward init-key                                 Create the encryption key
  $ keyward create-user alice -p '...' -r admin      Create an admin
  $ keyward list-users                               List users and lock state
  $ keyward unlock mario                             Clear a lockout
  $ keyward audit --user mario                       Events about one user
`,
    );

  program.addCommand(createInitKeyCommand(ctx));
  program.addCommand(createCreateUserCommand(ctx));
  program.addCommand(createListUsersCommand(ctx));
  program.addCommand(createChangePasswordCommand(ctx));
  program.addCommand(createChangeRoleCommand(ctx));
  program.addCommand(createActivateCommand(ctx));
  program.addCommand(createDeactivateCommand(ctx));
  program.addCommand(createUnlockCommand(ctx));
  program.addCommand(createDeleteUserCommand(ctx));
  program.addCommand(createAuditCommand(ctx));

  return program;
}
