/**
 * sciregistry invalidate — Tombstone a dataset
 *
 * Asks for confirmation unless --yes is given. The registry itself applies
 * the transition unconditionally; confirmation is a CLI concern.
 */

import { Command } from 'commander';
import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

export function invalidateCommand(): Command {
  return new Command('invalidate')
    .description('Invalidate a dataset (hidden from listings, kept for reference)')
    .argument('<id>', 'Dataset id')
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .action(async (id: string, options: { yes: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        if (!options.yes) {
          const rl = readline.createInterface({ input, output });
          let answer = '';
          try {
            answer = await rl.question(`Invalidate dataset ${id}? This cannot be undone. [y/N] `);
          } finally {
            rl.close();
          }
          if (answer.trim().toLowerCase() !== 'y') {
            // eslint-disable-next-line no-console
            console.log('Aborted.');
            return;
          }
        }

        await registry.invalidate(id, requester);
        // eslint-disable-next-line no-console
        console.log(`${t.red('Invalidated')} ${t.blue(id)}`);
      }, id),
    );
}
