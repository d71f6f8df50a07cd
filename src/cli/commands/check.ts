// Check command - validate the tree against a manifest (the default action)

import { Command } from 'commander';
import { LogLevel, getLogger } from '../../core/logger.js';
import { runCheck } from '../../services/check/check-service.js';
import { handleError } from '../utils/error-handler.js';

interface CheckCommandOptions {
  root: string;
  manifest?: string;
  json?: boolean;
  verbose?: boolean;
}

export function registerCheckCommand(program: Command): void {
  program
    .option('-r, --root <dir>', 'Root directory of the tree to validate', process.cwd())
    .option('-m, --manifest <name|path>', 'Bundled manifest name or path to a manifest file')
    .option('--json', 'Output the report as JSON')
    .option('--verbose', 'Log manifest resolution and matching details to stderr')
    .action((options: CheckCommandOptions) => {
      try {
        if (options.verbose) {
          getLogger().setLevel(LogLevel.DEBUG);
        }

        const { exitCode } = runCheck({
          root: options.root,
          manifest: options.manifest,
          format: options.json ? 'json' : 'text'
        });

        process.exitCode = exitCode;
      } catch (error) {
        handleError(error);
      }
    });
}
