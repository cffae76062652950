/**
 * Registry Kernel — Collaborator Interfaces
 *
 * The kernel never touches disk, network or a directory service. It is
 * handed implementations of these interfaces at construction time.
 * Concrete implementations live in @sciregistry/runtime-host.
 */

/**
 * Byte-addressable blob storage for file payloads.
 *
 * References are opaque to the registry. `put` must be durable before its
 * promise resolves: the registry records a manifest entry only after `put`
 * succeeds. Implementations signal failure by rejecting; the registry wraps
 * the rejection in a StorageError and does not retry.
 */
export interface ContentStore {
  /** Store bytes and return the reference under which they can be fetched. */
  put(data: Uint8Array): Promise<string>;
  /** Fetch bytes by reference. Null if nothing is stored under it. */
  get(reference: string): Promise<Uint8Array | null>;
  /** Byte length of the stored value. Null if nothing is stored under it. */
  size(reference: string): Promise<number | null>;
}

/**
 * Resolves the groups a user belongs to.
 *
 * Consulted by the permission matrix for every check that is not settled by
 * ownership or a direct user grant.
 */
export interface GroupResolver {
  groupsOf(user: string): Promise<ReadonlyArray<string>>;
}
