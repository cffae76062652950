/**
 * sciregistry chain — Version chain of a dataset, oldest first
 */

import { Command } from 'commander';
import { renderChain } from '../output/format.js';
import { withRuntime } from '../runtime.js';

export function chainCommand(): Command {
  return new Command('chain')
    .description('Show the version chain a dataset belongs to')
    .argument('<id>', 'Dataset id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const chain = await registry.chainOf(id, requester);
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(chain) : renderChain(chain, id));
      }, id),
    );
}
