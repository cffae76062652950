/**
 * @sciregistry/registry
 *
 * Dataset registry — the registry facade and its stateful components: the
 * dataset store, the permission matrix and the version chain.
 *
 * Depends on @sciregistry/kernel for types, errors and pure logic, and on
 * @sciregistry/runtime-host for the StateIO persistence contract.
 */

export type { DatasetRegistryOptions, OperationOptions } from './dataset-registry.js';
export { DatasetRegistry } from './dataset-registry.js';

export { DATASETS_FILE, DatasetStore } from './dataset-store.js';

export type { BatchResult } from './permission-matrix.js';
export { PERMISSIONS_FILE, PermissionMatrix } from './permission-matrix.js';

export { CHAIN_FILE, VersionChain } from './version-chain.js';

export { entryNameProblems, isJsonValue, jsonPreview } from './manifest.js';
