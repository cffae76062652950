/**
 * Registry Runtime Host — State-backed Group Resolver
 *
 * Group membership persisted as `groups.json` via the injected StateIO:
 *
 *   { "<group>": ["<user>", ...], ... }
 *
 * Member lists are kept sorted and free of duplicates. A group with no
 * members is removed from the file.
 *
 * Membership is read from state on every groupsOf() call, so a change made
 * by another process sharing the home takes effect on the next check.
 */

import type { GroupResolver } from '@sciregistry/kernel';
import { compareNames, ValidationError } from '@sciregistry/kernel';
import type { StateIO } from '../state/state-io.js';

export const GROUPS_FILE = 'groups.json';

type GroupTable = Readonly<Record<string, ReadonlyArray<string>>>;

export class StateGroupResolver implements GroupResolver {
  constructor(private readonly stateIO: StateIO) {}

  async groupsOf(user: string): Promise<ReadonlyArray<string>> {
    return Object.entries(this.load())
      .filter(([, members]) => members.includes(user))
      .map(([name]) => name)
      .sort(compareNames);
  }

  /** @returns false if the user was already a member */
  addMember(groupName: string, user: string): boolean {
    requireName('group', groupName);
    requireName('user', user);
    const table = { ...this.load() };
    const members = table[groupName] ?? [];
    if (members.includes(user)) return false;
    table[groupName] = [...members, user].sort(compareNames);
    this.stateIO.writeJson(GROUPS_FILE, table);
    return true;
  }

  /** @returns false if the user was not a member */
  removeMember(groupName: string, user: string): boolean {
    const table = { ...this.load() };
    const members = table[groupName] ?? [];
    if (!members.includes(user)) return false;
    const remaining = members.filter((m) => m !== user);
    if (remaining.length === 0) {
      delete table[groupName];
    } else {
      table[groupName] = remaining;
    }
    this.stateIO.writeJson(GROUPS_FILE, table);
    return true;
  }

  /** Groups and their members, sorted by group name. */
  listGroups(): ReadonlyArray<{ readonly name: string; readonly members: ReadonlyArray<string> }> {
    return Object.entries(this.load())
      .sort(([a], [b]) => compareNames(a, b))
      .map(([name, members]) => ({ name, members }));
  }

  private load(): Record<string, ReadonlyArray<string>> {
    const table = this.stateIO.readJson<GroupTable>(GROUPS_FILE, {});
    return { ...table };
  }
}

function requireName(kind: string, value: string): void {
  if (value.trim() === '') {
    throw ValidationError.single(kind, `${kind} name must not be empty`);
  }
}
