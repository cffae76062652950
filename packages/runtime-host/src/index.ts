/**
 * @sciregistry/runtime-host
 *
 * Dataset registry runtime host — side-effectful implementations of the
 * kernel's collaborator interfaces, state persistence, and home/config
 * resolution. Depends on @sciregistry/kernel (interfaces); implements
 * concrete behavior using Node.js built-ins.
 *
 * The kernel package defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// StateIO — JSON state files and JSONL logs under a registry home
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

// Content stores
export { FsContentStore } from './content/fs-content-store.js';
export { MemoryContentStore } from './content/memory-content-store.js';

// Group membership
export { GROUPS_FILE, StateGroupResolver } from './groups/state-group-resolver.js';
export { StaticGroupResolver } from './groups/static-group-resolver.js';

// Audit persistence
export { AUDIT_LOG_FILE, FileAuditSink } from './logging/file-audit-sink.js';
export type { UlidSources } from './logging/ulid.js';
export { createUlid, ulid } from './logging/ulid.js';
export type {
  AuditFilter,
  AuditReadResult,
  AuditReadStats,
  AuditRecord,
} from './logging/audit-reader.js';
export { filterAuditRecords, readAuditLog } from './logging/audit-reader.js';

// Home and configuration
export type { RegistryConfig, ResolveRegistryHomeOptions } from './home.js';
export {
  DEFAULT_REGISTRY_CONFIG,
  contentDir,
  homeStateIO,
  loadRegistryConfig,
  parseRegistryConfig,
  resolveRegistryHome,
} from './home.js';
