/**
 * Registry Kernel — Permission Types
 */

import type { Operation, Principal } from './principal.js';

/** One `(principal, operation)` pair of a dataset's permission matrix. */
export interface PermissionGrant {
  readonly principal: Principal;
  readonly operation: Operation;
}

/** The principals holding one operation, split by kind. Both lists are sorted. */
export interface PrincipalSet {
  readonly users: ReadonlyArray<string>;
  readonly groups: ReadonlyArray<string>;
}

/**
 * Display/audit view of a dataset's permissions.
 *
 * The owner is listed separately: the owner's access is implicit and never
 * appears among the stored grants.
 */
export interface PermissionListing {
  readonly owner: string;
  readonly read: PrincipalSet;
  readonly write: PrincipalSet;
}
