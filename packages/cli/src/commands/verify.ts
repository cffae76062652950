/**
 * sciregistry verify — Re-check a dataset's stored bytes
 *
 * Exits 1 when the stored payload no longer matches the recorded hash.
 */

import { Command } from 'commander';
import { renderReport } from '../output/format.js';
import { withRuntime } from '../runtime.js';

export function verifyCommand(): Command {
  return new Command('verify')
    .description("Verify a complete dataset's stored bytes against its hash")
    .argument('<id>', 'Dataset id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const report = await registry.verify(id, requester);
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(report, null, 2) : renderReport(report));
        if (!report.ok) {
          process.exitCode = 1;
        }
      }, id),
    );
}
