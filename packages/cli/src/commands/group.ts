/**
 * sciregistry group — Maintain group membership
 *
 *   sciregistry group add <group> <user>
 *   sciregistry group remove <group> <user>
 *   sciregistry group list [--json]
 *
 * Membership lives in the registry home's groups.json. Editing it is an
 * operator action and is not subject to dataset permissions.
 */

import { Command } from 'commander';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

function addCommand(): Command {
  return new Command('add')
    .description('Add a user to a group')
    .argument('<group>', 'Group name')
    .argument('<user>', 'User name')
    .action(async (group: string, user: string, _options: object, command: Command) =>
      withRuntime(command, async ({ groups }) => {
        const added = groups.addMember(group, user);
        // eslint-disable-next-line no-console
        console.log(added ? `${t.green('Added')} ${user} to ${group}` : t.dim(`${user} is already in ${group}`));
      }),
    );
}

function removeCommand(): Command {
  return new Command('remove')
    .description('Remove a user from a group')
    .argument('<group>', 'Group name')
    .argument('<user>', 'User name')
    .action(async (group: string, user: string, _options: object, command: Command) =>
      withRuntime(command, async ({ groups }) => {
        const removed = groups.removeMember(group, user);
        // eslint-disable-next-line no-console
        console.log(removed ? `${t.amber('Removed')} ${user} from ${group}` : t.dim(`${user} is not in ${group}`));
      }),
    );
}

function listGroupsCommand(): Command {
  return new Command('list')
    .description('List groups and their members')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ groups }) => {
        const table = groups.listGroups();
        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(table, null, 2));
          return;
        }
        if (table.length === 0) {
          // eslint-disable-next-line no-console
          console.log(t.dim('(no groups)'));
          return;
        }
        for (const { name, members } of table) {
          // eslint-disable-next-line no-console
          console.log(`${t.white(name)}  ${t.text(members.join(', '))}`);
        }
      }),
    );
}

export function groupCommand(): Command {
  return new Command('group')
    .description('Maintain group membership')
    .addCommand(addCommand())
    .addCommand(removeCommand())
    .addCommand(listGroupsCommand());
}
