/**
 * sciregistry permissions | grant | revoke — Per-dataset access control
 *
 *   sciregistry permissions <id>
 *   sciregistry grant  <id> <principal> <operation...>
 *   sciregistry revoke <id> <principal> <operation...>
 *
 * Principals are written `user:<name>` or `group:<name>`; a bare name is a
 * user. Operations are `read` and `write`; write does not imply read.
 * Only the dataset's owner may grant or revoke.
 */

import { Command } from 'commander';
import { ValidationError, parseOperation, parsePrincipal } from '@sciregistry/kernel';
import type { PermissionGrant, ValidationProblem } from '@sciregistry/kernel';
import { renderPermissions } from '../output/format.js';
import { withRuntime } from '../runtime.js';

/**
 * @throws {ValidationError} Listing every unparseable argument
 */
export function parseGrantArguments(
  principalText: string,
  operationTexts: ReadonlyArray<string>,
): PermissionGrant[] {
  const problems: ValidationProblem[] = [];
  const principal = parsePrincipal(principalText);
  if (principal === null) {
    problems.push({
      path: 'principal',
      message: `expected user:<name> or group:<name>, got "${principalText}"`,
    });
  }

  const grants: PermissionGrant[] = [];
  operationTexts.forEach((text, i) => {
    const operation = parseOperation(text);
    if (operation === null) {
      problems.push({ path: `operation.${i}`, message: `expected read or write, got "${text}"` });
    } else if (principal !== null) {
      grants.push({ principal, operation });
    }
  });

  if (problems.length > 0) {
    throw new ValidationError(problems);
  }
  return grants;
}

export function permissionsCommand(): Command {
  return new Command('permissions')
    .description('Show who may read and write a dataset')
    .argument('<id>', 'Dataset id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const listing = await registry.listPermissions(id, requester);
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(listing, null, 2) : renderPermissions(listing));
      }, id),
    );
}

function changeCommand(name: 'grant' | 'revoke'): Command {
  return new Command(name)
    .description(name === 'grant' ? 'Grant operations on a dataset' : 'Revoke operations on a dataset')
    .argument('<id>', 'Dataset id')
    .argument('<principal>', 'user:<name> or group:<name>')
    .argument('<operation...>', 'read and/or write')
    .action(async (id: string, principal: string, operations: string[], _options: object, command: Command) =>
      withRuntime(command, async ({ registry, requester }) => {
        const batch = parseGrantArguments(principal, operations);
        const listing = name === 'grant'
          ? await registry.updatePermissions(id, requester, batch, [])
          : await registry.updatePermissions(id, requester, [], batch);
        // eslint-disable-next-line no-console
        console.log(renderPermissions(listing));
      }, id),
    );
}

export function grantCommand(): Command {
  return changeCommand('grant');
}

export function revokeCommand(): Command {
  return changeCommand('revoke');
}
