/**
 * sciregistry upload — Register a container directory as a new dataset
 *
 * Runs the whole upload lifecycle: beginUpload with the container's
 * documents, one appendFile per file, then completeUpload with the payload
 * digest computed locally. The predecessor is --replaces if given, else the
 * container's own `replaces` field.
 *
 * A failure after beginUpload leaves the dataset incomplete; its id is
 * printed so the operator can inspect or invalidate it.
 */

import { Command } from 'commander';
import { readContainerDir } from '../container.js';
import { formatBytes } from '../output/format.js';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

export function uploadCommand(): Command {
  return new Command('upload')
    .description('Upload a container directory as a new dataset')
    .argument('<dir>', 'Container directory holding content.json and meta.json')
    .option('--replaces <id>', 'Id of the dataset this upload supersedes')
    .action(async (dir: string, options: { replaces?: string }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const container = await readContainerDir(dir);
        const id = await registry.beginUpload(requester, container.documents, options.replaces);

        try {
          for (const file of container.files) {
            await registry.appendFile(id, requester, file);
          }
          const dataset = await registry.completeUpload(id, requester, container.hash);
          // eslint-disable-next-line no-console
          console.log(`${t.green('Uploaded')} ${t.blue(dataset.id)}  ${t.dim(`${dataset.content.length} files, ${formatBytes(dataset.size)}`)}`);
          // eslint-disable-next-line no-console
          console.log(`hash: ${dataset.hash ?? ''}`);
        } catch (err: unknown) {
          // eslint-disable-next-line no-console
          console.error(t.amber(`Dataset ${id} was left incomplete.`));
          throw err;
        }
      }),
    );
}
