#!/usr/bin/env node
/**
 * Keyward CLI
 *
 * Administers the credential store on the machine that holds it.
 *
 * @example
 * ```bash
 * keyward init-key
 * keyward create-user alice --password '...' --role admin
 * keyward list-users --json
 * ```
 */

import { errorMessage } from '@keyward/storage';
import { createProgram } from './program';

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`✗ ${errorMessage(error)}`);
  process.exit(1);
});
