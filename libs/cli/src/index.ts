/**
 * Keyward CLI Library
 *
 * Exports the program and command creators for embedding the CLI.
 *
 * @packageDocumentation
 */

export { createProgram, VERSION } from './program';
export { consoleOutput, defaultContext, resolveDataDir, withEngine } from './context';
export type { CliContext, GlobalOptions, Output } from './context';
export { formatUsers, formatAudit } from './utils/format';
export * from './commands/index';
