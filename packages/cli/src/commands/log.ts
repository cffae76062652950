/**
 * sciregistry log — Query the audit log
 *
 * Every permission decision and every state change is recorded in
 * logs/audit.jsonl. Records are read with dedupe-on-read, filtered, and the
 * most recent --limit of them printed oldest first.
 *
 * Reading the log is an operator action on the home directory and is not
 * itself audited.
 */

import { Command } from 'commander';
import { AuditOutcome, ValidationError } from '@sciregistry/kernel';
import { AUDIT_LOG_FILE, filterAuditRecords, readAuditLog } from '@sciregistry/runtime-host';
import { renderAuditRecord } from '../output/format.js';
import { t } from '../output/theme.js';
import { withRuntime } from '../runtime.js';

interface LogOptions {
  dataset?: string;
  requester?: string;
  operation?: string;
  outcome?: string;
  limit: string;
  json?: boolean;
}

function parseOutcome(text: string | undefined): AuditOutcome | undefined {
  if (text === undefined) return undefined;
  const outcome = Object.values(AuditOutcome).find((o) => o.toLowerCase() === text.trim().toLowerCase());
  if (outcome === undefined) {
    throw ValidationError.single('outcome', `expected one of ${Object.values(AuditOutcome).join(', ')}, got "${text}"`);
  }
  return outcome;
}

function parseLimit(text: string): number {
  const limit = Number(text);
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw ValidationError.single('limit', `expected a positive integer, got "${text}"`);
  }
  return limit;
}

export function logCommand(): Command {
  return new Command('log')
    .description('Query the audit log')
    .option('--dataset <id>', 'Filter by dataset id')
    .option('--requester <user>', 'Filter by requester')
    .option('--operation <name>', 'Filter by operation (e.g. read, appendFile)')
    .option('--outcome <outcome>', 'Filter by outcome (Permit|Deny|Applied|Failed)')
    .option('--limit <n>', 'Maximum number of records to print', '100')
    .option('--json', 'Output as JSON')
    .action(async (options: LogOptions, command: Command) =>
      withRuntime(command, async ({ stateIO }) => {
        const outcome = parseOutcome(options.outcome);
        const limit = parseLimit(options.limit);
        const { records, stats } = readAuditLog(stateIO.readLogRaw(AUDIT_LOG_FILE));
        const selected = filterAuditRecords(records, {
          datasetId: options.dataset,
          requester: options.requester,
          operation: options.operation,
          outcome,
        }).slice(-limit);

        if (options.json === true) {
          // eslint-disable-next-line no-console
          console.log(JSON.stringify(selected, null, 2));
          return;
        }
        for (const record of selected) {
          // eslint-disable-next-line no-console
          console.log(renderAuditRecord(record));
        }
        if (stats.parseErrors > 0 || stats.partialTrailingLine) {
          // eslint-disable-next-line no-console
          console.error(t.amber(`[warn] ${stats.parseErrors} unreadable lines skipped` +
            (stats.partialTrailingLine ? ', last line incomplete' : '')));
        }
      }),
    );
}
