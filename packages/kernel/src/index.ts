/**
 * @sciregistry/kernel
 *
 * Dataset registry kernel — types, error taxonomy, hash verification,
 * container metadata validation, keyed locking, and the audit logger.
 *
 * This package is side-effect free. It imports no I/O API; node:crypto is
 * used for hashing only. Content storage, group membership and audit
 * persistence are injected through the interfaces in ./adapters and
 * ./logging, implemented by @sciregistry/runtime-host.
 */

// Types
export * from './types/index.js';

// Errors
export type {
  IntegrityFailure,
  IntegrityFailureReason,
  RegistryErrorCode,
  ValidationProblem,
} from './errors.js';
export {
  CancelledError,
  ChainConflictError,
  ForbiddenError,
  ImmutableError,
  IntegrityError,
  NotFoundError,
  REGISTRY_ERROR_CODES,
  RegistryError,
  StorageError,
  ValidationError,
  isRegistryError,
} from './errors.js';

// Collaborator interfaces (implementations live in runtime-host)
export type { ContentStore, GroupResolver } from './adapters/index.js';

// Audit
export type { AuditSink } from './logging/audit-sink.js';
export type { AuditSubject } from './logging/audit-log.js';
export { AuditLogger } from './logging/audit-log.js';

// Implementations
export type { HashableEntry, IntegrityReport } from './integrity/hash-verifier.js';
export {
  compareNames,
  computeManifestDigest,
  digestBytes,
  digestPayload,
  normalizeDigest,
  verifyManifest,
} from './integrity/hash-verifier.js';
export {
  MIN_MODEL_VERSION,
  compareModelVersions,
  parseModelVersion,
  validateContainerMetadata,
} from './metadata/container.js';
export { KeyedLock } from './concurrency/keyed-lock.js';
