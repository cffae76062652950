/**
 * Registry Kernel — Audit Types
 *
 * Every authorization decision and every mutation outcome produces exactly
 * one AuditEvent. Denied requests are logged like permitted ones; a request
 * that is permitted and then fails is logged twice (Permit, then Failed).
 * Requests for an unknown dataset, or for a change to a frozen one, are
 * refused at the gate and logged as Deny with the error code.
 */

import type { RegistryErrorCode } from '../errors.js';

/** The registry operations that produce audit events. */
export const REGISTRY_OPERATIONS = [
  'beginUpload',
  'appendFile',
  'completeUpload',
  'read',
  'invalidate',
  'listVisible',
  'updatePermissions',
  'listPermissions',
  'chainOf',
  'verify',
  'download',
] as const;

export type RegistryOperation = (typeof REGISTRY_OPERATIONS)[number];

export enum AuditOutcome {
  /** The permission check passed. */
  Permit = 'Permit',
  /** The request was refused before any work was done. */
  Deny = 'Deny',
  /** A state change was applied and persisted. */
  Applied = 'Applied',
  /** A permitted request failed before any state change was applied. */
  Failed = 'Failed',
}

export interface AuditEvent {
  /** ISO 8601. */
  readonly timestamp: string;
  /** User id of the requester. */
  readonly requester: string;
  readonly operation: RegistryOperation;
  /** Null for operations not scoped to one dataset (listVisible, a rejected beginUpload). */
  readonly dataset_id: string | null;
  readonly outcome: AuditOutcome;
  /** Set for Deny and Failed. */
  readonly error_code: RegistryErrorCode | null;
  /** Short free-form context (file name, grant summary, error message). */
  readonly detail: string | null;
}
