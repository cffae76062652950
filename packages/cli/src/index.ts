/**
 * @sciregistry/cli
 *
 * Operator command-line interface over the dataset registry. The executable
 * lives in src/bin/sciregistry.ts; this module exposes the program and its
 * building blocks for embedding and tests.
 */

export { createProgram } from './commands/index.js';
export type { CliRuntime, GlobalOptions } from './runtime.js';
export { buildRuntime, formatError, resolveRequester, withRuntime } from './runtime.js';
export type { ContainerDirectory } from './container.js';
export { readContainerDir } from './container.js';
export { parseGrantArguments } from './commands/permissions.js';
