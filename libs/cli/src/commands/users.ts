/**
 * User administration commands
 *
 * Operate on the credential store directly, acting as the local operator.
 * Nothing here goes through login.
 */

import { Command, InvalidArgumentError } from 'commander';
import { RoleSchema } from '@keyward/ipc';
import type { Role } from '@keyward/ipc';
import { OPERATOR_IDENTITY } from '@keyward/daemon';
import { withEngine } from '../context';
import type { CliContext, GlobalOptions } from '../context';
import { formatUsers } from '../utils/format';

function parseRole(value: string): Role {
  const result = RoleSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Role must be one of: ${RoleSchema.options.join(', ')}`);
  }
  return result.data;
}

type CreateUserOptions = {
  password: string;
  role: Role;
  displayName?: string;
  email?: string;
};

export function createCreateUserCommand(ctx: CliContext): Command {
  return new Command('create-user')
    .description('Create a user')
    .argument('<username>', 'Login name (case-sensitive)')
    .requiredOption('-p, --password <password>', 'Initial password')
    .option('-r, --role <role>', 'admin or user', parseRole, 'user')
    .option('-n, --display-name <name>', 'Display name')
    .option('-e, --email <email>', 'Email address')
    .action((username: string, options: CreateUserOptions, command: Command) => {
      const user = withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.createUser(OPERATOR_IDENTITY, {
          username,
          password: options.password,
          role: options.role,
          displayName: options.displayName,
          email: options.email,
        }),
      );
      ctx.out.log(`✓ Created ${user.role} '${user.username}'`);
    });
}

export function createListUsersCommand(ctx: CliContext): Command {
  return new Command('list-users')
    .description('List users')
    .option('-j, --json', 'Output as JSON')
    .action((options: { json?: boolean }, command: Command) => {
      const users = withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.listUsers(OPERATOR_IDENTITY),
      );
      if (options.json) {
        ctx.out.log(JSON.stringify(users, null, 2));
        return;
      }
      for (const line of formatUsers(users)) ctx.out.log(line);
    });
}

export function createChangePasswordCommand(ctx: CliContext): Command {
  return new Command('change-password')
    .description("Reset a user's password (also clears a lockout)")
    .argument('<username>', 'User to update')
    .requiredOption('-p, --password <password>', 'New password')
    .action((username: string, options: { password: string }, command: Command) => {
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.changePassword(OPERATOR_IDENTITY, username, options.password),
      );
      ctx.out.log(`✓ Password changed for '${username}'`);
    });
}

export function createChangeRoleCommand(ctx: CliContext): Command {
  return new Command('change-role')
    .description("Change a user's role")
    .argument('<username>', 'User to update')
    .argument('<role>', 'admin or user', parseRole)
    .action((username: string, role: Role, _options: unknown, command: Command) => {
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.changeRole(OPERATOR_IDENTITY, username, role),
      );
      ctx.out.log(`✓ '${username}' is now ${role}`);
    });
}

export function createActivateCommand(ctx: CliContext): Command {
  return new Command('activate')
    .description('Allow a user to log in again')
    .argument('<username>', 'User to activate')
    .action((username: string, _options: unknown, command: Command) => {
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.activate(OPERATOR_IDENTITY, username),
      );
      ctx.out.log(`✓ Activated '${username}'`);
    });
}

export function createDeactivateCommand(ctx: CliContext): Command {
  return new Command('deactivate')
    .description('Disable a user without deleting it')
    .argument('<username>', 'User to deactivate')
    .action((username: string, _options: unknown, command: Command) => {
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.deactivate(OPERATOR_IDENTITY, username),
      );
      ctx.out.log(`✓ Deactivated '${username}'`);
    });
}

export function createUnlockCommand(ctx: CliContext): Command {
  return new Command('unlock')
    .description('Clear the failed-login counter and lockout of a user')
    .argument('<username>', 'User to unlock')
    .action((username: string, _options: unknown, command: Command) => {
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) => engine.unlock(OPERATOR_IDENTITY, username));
      ctx.out.log(`✓ Unlocked '${username}'`);
    });
}

export function createDeleteUserCommand(ctx: CliContext): Command {
  return new Command('delete-user')
    .description('Delete a user')
    .argument('<username>', 'User to delete')
    .option('-y, --yes', 'Confirm the deletion')
    .action((username: string, options: { yes?: boolean }, command: Command) => {
      if (!options.yes) {
        throw new Error(`Refusing to delete '${username}' without --yes`);
      }
      withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.deleteUser(OPERATOR_IDENTITY, username),
      );
      ctx.out.log(`✓ Deleted '${username}'`);
    });
}
