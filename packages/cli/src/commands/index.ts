/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/sciregistry.ts   (the executable)
 *   test/                    (each test builds its own program)
 */

import { Command } from 'commander';
import { chainCommand } from './chain.js';
import { downloadCommand } from './download.js';
import { groupCommand } from './group.js';
import { invalidateCommand } from './invalidate.js';
import { listCommand } from './list.js';
import { logCommand } from './log.js';
import { grantCommand, permissionsCommand, revokeCommand } from './permissions.js';
import { showCommand } from './show.js';
import { uploadCommand } from './upload.js';
import { verifyCommand } from './verify.js';

export function createProgram(): Command {
  return new Command('sciregistry')
    .description(
      'Registry for immutable scientific data containers.\n' +
      'Datasets are content-hashed, versioned by replacement, and access-controlled per dataset.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Registry home directory (default: $SCIREG_HOME or ~/.sciregistry)')
    .option('--as <user>', 'Act as this user (default: $SCIREG_USER or the OS user)')
    .addCommand(uploadCommand())
    .addCommand(showCommand())
    .addCommand(listCommand())
    .addCommand(invalidateCommand())
    .addCommand(permissionsCommand())
    .addCommand(grantCommand())
    .addCommand(revokeCommand())
    .addCommand(chainCommand())
    .addCommand(verifyCommand())
    .addCommand(downloadCommand())
    .addCommand(groupCommand())
    .addCommand(logCommand());
}
