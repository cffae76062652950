/**
 * sciregistry download — Fetch one file of a complete dataset
 *
 * Writes to -o <file>, or to stdout without it. The bytes are checked
 * against the entry's recorded digest before anything is written.
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { formatBytes } from '../output/format.js';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

export function downloadCommand(): Command {
  return new Command('download')
    .description('Download one file of a dataset')
    .argument('<id>', 'Dataset id')
    .argument('<name>', 'File name within the dataset')
    .option('-o, --output <file>', 'Write to this file instead of stdout')
    .action(async (id: string, name: string, options: { output?: string }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const data = await registry.download(id, requester, name);
        if (options.output === undefined) {
          process.stdout.write(data);
          return;
        }
        await writeFile(options.output, data);
        // eslint-disable-next-line no-console
        console.error(t.dim(`${name} → ${options.output} (${formatBytes(data.byteLength)})`));
      }, id),
    );
}
