/**
 * Registry Kernel — Principal and Operation Types
 *
 * A principal is anything a permission can be granted to: a single user or a
 * named group of users. Requesters are always users; groups only ever appear
 * as grant targets.
 *
 * Principals are tagged rather than distinguished by naming convention, so a
 * user and a group may share an id without colliding in the permission matrix.
 */

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * The two independently grantable operations.
 *
 * Write does NOT imply read. A principal may hold write without read; clients
 * that want both must grant both.
 */
export enum Operation {
  Read = 'read',
  Write = 'write',
}

/** All operations, in canonical order. */
export const OPERATIONS: ReadonlyArray<Operation> = [Operation.Read, Operation.Write];

// ---------------------------------------------------------------------------
// Principals
// ---------------------------------------------------------------------------

export enum PrincipalKind {
  User = 'user',
  Group = 'group',
}

export interface UserPrincipal {
  readonly kind: PrincipalKind.User;
  readonly id: string;
}

export interface GroupPrincipal {
  readonly kind: PrincipalKind.Group;
  readonly id: string;
}

export type Principal = UserPrincipal | GroupPrincipal;

export function user(id: string): UserPrincipal {
  return { kind: PrincipalKind.User, id };
}

export function group(id: string): GroupPrincipal {
  return { kind: PrincipalKind.Group, id };
}

/** `user:alice` / `group:lab`. Inverse of parsePrincipal(). */
export function formatPrincipal(principal: Principal): string {
  return `${principal.kind}:${principal.id}`;
}

/**
 * Parse the `<kind>:<id>` form used by the CLI and the audit log.
 *
 * A bare id without a kind prefix is read as a user.
 * Returns null for an unknown kind or an empty id.
 */
export function parsePrincipal(text: string): Principal | null {
  const idx = text.indexOf(':');
  if (idx === -1) {
    return text.trim() === '' ? null : user(text.trim());
  }
  const kind = text.slice(0, idx).trim().toLowerCase();
  const id = text.slice(idx + 1).trim();
  if (id === '') return null;
  if (kind === PrincipalKind.User) return user(id);
  if (kind === PrincipalKind.Group) return group(id);
  return null;
}

export function parseOperation(text: string): Operation | null {
  const normalized = text.trim().toLowerCase();
  return OPERATIONS.find((op) => op === normalized) ?? null;
}

export function samePrincipal(a: Principal, b: Principal): boolean {
  return a.kind === b.kind && a.id === b.id;
}
