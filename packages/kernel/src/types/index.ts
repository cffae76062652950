/**
 * Registry Kernel — Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file apart from the principal helpers.
 */

export type {
  ContainerDocuments,
  ContainerType,
  Dataset,
  DatasetMetadata,
  FileEntry,
  FileInput,
  InlineFileInput,
  JsonValue,
  SoftwareReference,
  StoredFileInput,
} from './dataset.js';
export { isInlineFileInput } from './dataset.js';

export type { GroupPrincipal, Principal, UserPrincipal } from './principal.js';
export {
  OPERATIONS,
  Operation,
  PrincipalKind,
  formatPrincipal,
  group,
  parseOperation,
  parsePrincipal,
  samePrincipal,
  user,
} from './principal.js';

export type { PermissionGrant, PermissionListing, PrincipalSet } from './permission.js';

export type { AuditEvent, RegistryOperation } from './audit.js';
export { AuditOutcome, REGISTRY_OPERATIONS } from './audit.js';

export type { ValidationResult } from './validation.js';
