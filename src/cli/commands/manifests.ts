// Manifests command - list bundled manifests

import { Command } from 'commander';
import { ManifestService, DEFAULT_MANIFEST } from '../../services/config/manifest-service.js';
import { handleError } from '../utils/error-handler.js';

export function createManifestsCommand(): Command {
  return new Command('manifests')
    .description('List bundled manifests')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      try {
        const service = new ManifestService({ root: process.cwd() });
        const names = service.listBundled();

        if (options.json) {
          console.log(JSON.stringify(names, null, 2));
          return;
        }

        for (const name of names) {
          const marker = name === DEFAULT_MANIFEST ? ' (default)' : '';
          const manifest = service.load(name);
          console.log(`${name.padEnd(24)} ${manifest.name}${marker}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
