/**
 * sciregistry show — Display one dataset
 */

import { Command } from 'commander';
import { renderDataset } from '../output/format.js';
import { withRuntime } from '../runtime.js';

export function showCommand(): Command {
  return new Command('show')
    .description('Show a dataset: metadata, state and manifest')
    .argument('<id>', 'Dataset id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const dataset = await registry.read(id, requester);
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(dataset, null, 2) : renderDataset(dataset));
      }, id),
    );
}
