/**
 * Registry Runtime Host — Static Group Resolver
 *
 * Fixed user → groups mapping supplied at construction. For tests and for
 * hosts that resolve membership elsewhere and hand the registry a snapshot.
 */

import type { GroupResolver } from '@sciregistry/kernel';

export class StaticGroupResolver implements GroupResolver {
  private readonly memberships: ReadonlyMap<string, ReadonlyArray<string>>;

  constructor(memberships: Readonly<Record<string, ReadonlyArray<string>>> = {}) {
    this.memberships = new Map(Object.entries(memberships).map(([u, gs]) => [u, [...gs]]));
  }

  async groupsOf(user: string): Promise<ReadonlyArray<string>> {
    return this.memberships.get(user) ?? [];
  }
}
