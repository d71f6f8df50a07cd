// Preflight program definition

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { createManifestsCommand } from './commands/manifests.js';

/**
 * Builds the `preflight` program.
 *
 * Options are positional: root options go before a subcommand, so
 * `preflight manifests --json` belongs to the subcommand.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('preflight')
    .description('Static completeness checker - verify expected files and definitions are present')
    .version('0.1.0')
    .enablePositionalOptions();

  registerCheckCommand(program);
  program.addCommand(createManifestsCommand());

  return program;
}
