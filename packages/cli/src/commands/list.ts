/**
 * sciregistry list — Datasets visible to the requester
 *
 * Newest upload first. Invalidated datasets are not listed; `show` still
 * reaches them by id.
 */

import { Command } from 'commander';
import type { Dataset } from '@sciregistry/kernel';
import { renderDatasetRow } from '../output/format.js';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

export function listCommand(): Command {
  return new Command('list')
    .description('List the datasets you can read, newest first')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const datasets: Dataset[] = [];
        for await (const dataset of registry.listVisible(requester)) {
          datasets.push(dataset);
        }

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(datasets, null, 2));
          return;
        }
        if (datasets.length === 0) {
          // eslint-disable-next-line no-console
          console.log(t.dim('(no datasets)'));
          return;
        }
        for (const dataset of datasets) {
          // eslint-disable-next-line no-console
          console.log(renderDatasetRow(dataset));
        }
      }),
    );
}
