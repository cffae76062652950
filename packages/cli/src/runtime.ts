/**
 * runtime.ts — Registry construction for CLI commands
 *
 * Every command builds a fresh runtime over the registry home: state and
 * audit log through FileStateIO, payloads through FsContentStore, group
 * membership through StateGroupResolver.
 *
 * The CLI is the registry's (trusted, local) authenticator. The requester
 * is taken from, in order:
 *   1. --as <user>
 *   2. SCIREG_USER
 *   3. the operating-system user name
 */

import { userInfo } from 'node:os';
import type { Command } from 'commander';
import { isRegistryError } from '@sciregistry/kernel';
import {
  FileAuditSink,
  FsContentStore,
  StateGroupResolver,
  contentDir,
  homeStateIO,
  loadRegistryConfig,
  resolveRegistryHome,
} from '@sciregistry/runtime-host';
import type { FileStateIO, RegistryConfig } from '@sciregistry/runtime-host';
import { DatasetRegistry } from '@sciregistry/registry';
import { t } from './output/theme.js';

export type GlobalOptions = {
  readonly home?: string | undefined;
  readonly as?: string | undefined;
};

export interface CliRuntime {
  readonly home: string;
  readonly config: RegistryConfig;
  readonly stateIO: FileStateIO;
  readonly groups: StateGroupResolver;
  readonly registry: DatasetRegistry;
  readonly requester: string;
}

export function resolveRequester(explicit?: string): string {
  if (explicit !== undefined && explicit.trim() !== '') {
    return explicit.trim();
  }
  const fromEnv = process.env['SCIREG_USER'];
  if (fromEnv !== undefined && fromEnv.trim() !== '') {
    return fromEnv.trim();
  }
  return userInfo().username;
}

export function buildRuntime(opts: GlobalOptions): CliRuntime {
  const home = resolveRegistryHome({ home: opts.home });
  const config = loadRegistryConfig(home);
  const stateIO = homeStateIO(home);
  const groups = new StateGroupResolver(stateIO);
  const registry = new DatasetRegistry({
    stateIO,
    contentStore: new FsContentStore(contentDir(home)),
    groups,
    auditSink: new FileAuditSink(stateIO),
    previewMaxBytes: config.previewMaxBytes,
  });
  return { home, config, stateIO, groups, registry, requester: resolveRequester(opts.as) };
}

// ---------------------------------------------------------------------------
// Error presentation
// ---------------------------------------------------------------------------

/**
 * `<code>: <message>` for registry errors.
 *
 * With `hideForbidden`, a Forbidden refusal for `datasetId` reads exactly
 * like the registry's NotFound for an unknown id.
 */
export function formatError(err: unknown, hideForbidden: boolean, datasetId?: string): string {
  if (isRegistryError(err)) {
    if (hideForbidden && err.code === 'Forbidden' && datasetId !== undefined) {
      return `NotFound: Dataset ${datasetId} not found`;
    }
    return `${err.code}: ${err.message}`;
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Build the runtime from the command's global options and run `work`.
 *
 * Errors are printed to stderr and set the exit code to 1; they are not
 * rethrown, so Commander's own error handling never sees them.
 */
export async function withRuntime(
  command: Command,
  work: (rt: CliRuntime) => Promise<void>,
  datasetId?: string,
): Promise<void> {
  let hideForbidden = false;
  try {
    const rt = buildRuntime(command.optsWithGlobals<GlobalOptions>());
    hideForbidden = rt.config.hideForbidden;
    await work(rt);
  } catch (err: unknown) {
    // eslint-disable-next-line no-console
    console.error(t.red(formatError(err, hideForbidden, datasetId)));
    process.exitCode = 1;
  }
}
