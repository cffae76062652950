/**
 * Dataset Registry — Permission Matrix
 *
 * Stores `(dataset, principal, operation)` grants and answers access checks.
 *
 * Access rule, evaluated by check():
 *   1. the dataset's owner holds read and write, always
 *   2. a principal holding the grant directly has access
 *   3. a user belonging to a group that holds the grant has access
 *
 * The owner's access is implicit. It is never stored as a grant, so it can be
 * neither granted nor revoked: both are no-ops for the owner.
 *
 * Write does not imply read.
 *
 * State is loaded from `permissions.json` at construction and on reload(),
 * and written back in full after every change, via the injected StateIO.
 */

import type {
  GroupResolver,
  PermissionGrant,
  PermissionListing,
  Principal,
  PrincipalSet,
  ValidationProblem,
} from '@sciregistry/kernel';
import {
  compareNames,
  formatPrincipal,
  NotFoundError,
  Operation,
  PrincipalKind,
  ValidationError,
} from '@sciregistry/kernel';
import type { StateIO } from '@sciregistry/runtime-host';

export const PERMISSIONS_FILE = 'permissions.json';

/** Persisted shape of one dataset's row of the matrix. */
interface MatrixRow {
  readonly owner: string;
  readonly grants: ReadonlyArray<PermissionGrant>;
}

type MatrixState = Readonly<Record<string, MatrixRow>>;

export interface BatchResult {
  /** Grants that were not already present. */
  readonly granted: number;
  /** Grants that were present and are now gone. */
  readonly revoked: number;
}

export class PermissionMatrix {
  private readonly rows: Map<string, MatrixRow> = new Map();

  /**
   * @param stateIO - Persistence for `permissions.json`
   * @param groups - Membership lookups for group grants
   */
  constructor(
    private readonly stateIO: StateIO,
    private readonly groups: GroupResolver,
  ) {
    this.reload();
  }

  reload(): void {
    this.rows.clear();
    for (const [datasetId, row] of Object.entries(this.stateIO.readJson<MatrixState>(PERMISSIONS_FILE, {}))) {
      this.rows.set(datasetId, row);
    }
  }

  // -------------------------------------------------------------------------
  // Ownership
  // -------------------------------------------------------------------------

  /**
   * Create the row for a new dataset, with no stored grants.
   *
   * @throws {ValidationError} If the dataset already has a row
   */
  registerOwner(datasetId: string, owner: string): void {
    if (this.rows.has(datasetId)) {
      throw ValidationError.single('dataset_id', `permissions for ${datasetId} already exist`);
    }
    this.commit(datasetId, { owner, grants: [] });
  }

  ownerOf(datasetId: string): string | null {
    return this.rows.get(datasetId)?.owner ?? null;
  }

  /** Drop a dataset's row entirely. Used to roll back a failed upload. */
  forget(datasetId: string): void {
    if (this.rows.has(datasetId)) {
      this.commit(datasetId, undefined);
    }
  }

  // -------------------------------------------------------------------------
  // Single changes
  // -------------------------------------------------------------------------

  /**
   * Idempotent upsert of one grant.
   *
   * @returns true if the grant was added
   * @throws {NotFoundError} If the dataset has no row
   */
  grant(datasetId: string, principal: Principal, operation: Operation): boolean {
    return this.applyBatch(datasetId, [{ principal, operation }], []).granted === 1;
  }

  /**
   * Idempotent removal of one grant.
   *
   * @returns true if the grant was present
   * @throws {NotFoundError} If the dataset has no row
   */
  revoke(datasetId: string, principal: Principal, operation: Operation): boolean {
    return this.applyBatch(datasetId, [], [{ principal, operation }]).revoked === 1;
  }

  /**
   * Apply grants and revokes together, all or nothing.
   *
   * Every change is validated before any is applied; the result is persisted
   * in a single write. Grants to and revokes from the owner are skipped.
   *
   * @throws {NotFoundError} If the dataset has no row
   * @throws {ValidationError} If a principal id is empty, an operation is
   *   unknown, or the same grant appears among both grants and revokes
   */
  applyBatch(
    datasetId: string,
    grants: ReadonlyArray<PermissionGrant>,
    revokes: ReadonlyArray<PermissionGrant>,
  ): BatchResult {
    const row = this.requireRow(datasetId);

    const problems: ValidationProblem[] = [
      ...grants.flatMap((g, i) => checkGrant(g, `grants.${i}`)),
      ...revokes.flatMap((r, i) => checkGrant(r, `revokes.${i}`)),
    ];
    const granting = new Set(grants.map(grantKey));
    revokes.forEach((r, i) => {
      if (granting.has(grantKey(r))) {
        problems.push({
          path: `revokes.${i}`,
          message: `${describeGrant(r)} is both granted and revoked`,
        });
      }
    });
    if (problems.length > 0) {
      throw new ValidationError(problems);
    }

    const current = new Map(row.grants.map((g) => [grantKey(g), g]));
    let granted = 0;
    let revoked = 0;
    for (const g of grants) {
      if (isOwner(row, g.principal) || current.has(grantKey(g))) continue;
      current.set(grantKey(g), { principal: g.principal, operation: g.operation });
      granted++;
    }
    for (const r of revokes) {
      if (current.delete(grantKey(r))) revoked++;
    }

    if (granted > 0 || revoked > 0) {
      const next = [...current.values()].sort((a, b) => compareNames(grantKey(a), grantKey(b)));
      this.commit(datasetId, { owner: row.owner, grants: next });
    }
    return { granted, revoked };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Whether `principal` may perform `operation` on the dataset.
   *
   * Unknown datasets yield false. Group membership is only looked up when the
   * principal is a user and some group holds the operation.
   */
  async check(datasetId: string, principal: Principal, operation: Operation): Promise<boolean> {
    const row = this.rows.get(datasetId);
    if (row === undefined) return false;
    if (isOwner(row, principal)) return true;

    const holders = row.grants.filter((g) => g.operation === operation);
    if (holders.some((g) => g.principal.kind === principal.kind && g.principal.id === principal.id)) {
      return true;
    }
    if (principal.kind !== PrincipalKind.User) return false;

    const groupHolders = new Set(
      holders.filter((g) => g.principal.kind === PrincipalKind.Group).map((g) => g.principal.id),
    );
    if (groupHolders.size === 0) return false;
    const memberships = await this.groups.groupsOf(principal.id);
    return memberships.some((name) => groupHolders.has(name));
  }

  /**
   * @throws {NotFoundError} If the dataset has no row
   */
  list(datasetId: string): PermissionListing {
    const row = this.requireRow(datasetId);
    return {
      owner: row.owner,
      read: holdersOf(row, Operation.Read),
      write: holdersOf(row, Operation.Write),
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requireRow(datasetId: string): MatrixRow {
    const row = this.rows.get(datasetId);
    if (row === undefined) {
      throw new NotFoundError(`No permissions recorded for dataset ${datasetId}`);
    }
    return row;
  }

  /** Replace (or with `undefined`, drop) a row; memory is restored if the write fails. */
  private commit(datasetId: string, row: MatrixRow | undefined): void {
    const previous = this.rows.get(datasetId);
    setOrDelete(this.rows, datasetId, row);
    try {
      this.persist();
    } catch (err: unknown) {
      setOrDelete(this.rows, datasetId, previous);
      throw err;
    }
  }

  private persist(): void {
    this.stateIO.writeJson<MatrixState>(PERMISSIONS_FILE, Object.fromEntries(this.rows));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function setOrDelete<V>(map: Map<string, V>, key: string, value: V | undefined): void {
  if (value === undefined) {
    map.delete(key);
  } else {
    map.set(key, value);
  }
}

function grantKey(g: PermissionGrant): string {
  return `${formatPrincipal(g.principal)}#${g.operation}`;
}

function describeGrant(g: PermissionGrant): string {
  return `${g.operation} for ${formatPrincipal(g.principal)}`;
}

function isOwner(row: MatrixRow, principal: Principal): boolean {
  return principal.kind === PrincipalKind.User && principal.id === row.owner;
}

function checkGrant(g: PermissionGrant, path: string): ValidationProblem[] {
  const problems: ValidationProblem[] = [];
  if (g.principal.id.trim() === '') {
    problems.push({ path: `${path}.principal`, message: 'principal id must not be empty' });
  }
  if (g.operation !== Operation.Read && g.operation !== Operation.Write) {
    problems.push({ path: `${path}.operation`, message: `unknown operation ${String(g.operation)}` });
  }
  return problems;
}

function holdersOf(row: MatrixRow, operation: Operation): PrincipalSet {
  const holders = row.grants.filter((g) => g.operation === operation);
  const idsOf = (kind: PrincipalKind): string[] =>
    holders
      .filter((g) => g.principal.kind === kind)
      .map((g) => g.principal.id)
      .sort(compareNames);
  return { users: idsOf(PrincipalKind.User), groups: idsOf(PrincipalKind.Group) };
}
