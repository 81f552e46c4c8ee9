/**
 * Audit log command
 */

import { Command, InvalidArgumentError } from 'commander';
import { OPERATOR_IDENTITY } from '@keyward/daemon';
import { withEngine } from '../context';
import type { CliContext, GlobalOptions } from '../context';
import { formatAudit } from '../utils/format';

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 1000) {
    throw new InvalidArgumentError('Limit must be an integer between 1 and 1000');
  }
  return limit;
}

type AuditOptions = {
  limit: number;
  user?: string;
  json?: boolean;
};

export function createAuditCommand(ctx: CliContext): Command {
  return new Command('audit')
    .description('Show recent authentication and administration events, newest first')
    .option('-l, --limit <n>', 'Number of events', parseLimit, 50)
    .option('-u, --user <username>', 'Only events about this user')
    .option('-j, --json', 'Output as JSON')
    .action((options: AuditOptions, command: Command) => {
      const events = withEngine(ctx, command.optsWithGlobals<GlobalOptions>(), (engine) =>
        engine.listAudit(OPERATOR_IDENTITY, options.limit, options.user),
      );
      if (options.json) {
        ctx.out.log(JSON.stringify(events, null, 2));
        return;
      }
      for (const line of formatAudit(events)) ctx.out.log(line);
    });
}
