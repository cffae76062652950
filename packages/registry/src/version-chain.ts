/**
 * Dataset Registry — Version Chain
 *
 * Maintains the `replaces` relation between datasets in both directions so
 * that predecessor and successor lookups are single map reads.
 *
 * Chain invariants, enforced by link():
 *   - a dataset has at most one predecessor
 *   - a dataset has at most one direct successor
 *   - the predecessor must exist
 *   - the relation is acyclic
 *
 * Persisted as `chain.json`: a map from dataset id to the id it replaces.
 * The successor map is rebuilt from it on every reload().
 */

import { ChainConflictError } from '@sciregistry/kernel';
import type { StateIO } from '@sciregistry/runtime-host';

export const CHAIN_FILE = 'chain.json';

type ChainState = Readonly<Record<string, string>>;

export class VersionChain {
  private readonly predecessors: Map<string, string> = new Map();
  private readonly successors: Map<string, string> = new Map();

  /**
   * @param stateIO - Persistence for `chain.json`
   * @param exists - Whether a dataset id is known to the registry
   */
  constructor(
    private readonly stateIO: StateIO,
    private readonly exists: (datasetId: string) => boolean,
  ) {
    this.reload();
  }

  reload(): void {
    this.predecessors.clear();
    this.successors.clear();
    for (const [id, predecessor] of Object.entries(this.stateIO.readJson<ChainState>(CHAIN_FILE, {}))) {
      this.predecessors.set(id, predecessor);
      this.successors.set(predecessor, id);
    }
  }

  /**
   * Record that `newId` replaces `predecessorId`.
   *
   * @throws {ChainConflictError} If any chain invariant would be violated
   */
  link(newId: string, predecessorId: string): void {
    if (!this.exists(predecessorId)) {
      throw new ChainConflictError(`Predecessor ${predecessorId} does not exist`);
    }
    const taken = this.successors.get(predecessorId);
    if (taken !== undefined) {
      throw new ChainConflictError(`Dataset ${predecessorId} is already replaced by ${taken}`);
    }
    const existing = this.predecessors.get(newId);
    if (existing !== undefined) {
      throw new ChainConflictError(`Dataset ${newId} already replaces ${existing}`);
    }
    if (this.ancestorsOf(predecessorId).includes(newId) || newId === predecessorId) {
      throw new ChainConflictError(
        `Linking ${newId} to ${predecessorId} would make the chain cyclic`,
      );
    }

    this.predecessors.set(newId, predecessorId);
    this.successors.set(predecessorId, newId);
    this.persistOrUndo(() => {
      this.predecessors.delete(newId);
      this.successors.delete(predecessorId);
    });
  }

  /** Remove the link from `newId` to its predecessor. Used to roll back a failed upload. */
  unlink(newId: string): void {
    const predecessor = this.predecessors.get(newId);
    if (predecessor === undefined) return;
    this.predecessors.delete(newId);
    if (this.successors.get(predecessor) === newId) {
      this.successors.delete(predecessor);
    }
    this.persistOrUndo(() => {
      this.predecessors.set(newId, predecessor);
      this.successors.set(predecessor, newId);
    });
  }

  predecessorOf(datasetId: string): string | null {
    return this.predecessors.get(datasetId) ?? null;
  }

  successorOf(datasetId: string): string | null {
    return this.successors.get(datasetId) ?? null;
  }

  /**
   * The full chain `datasetId` belongs to, oldest first.
   *
   * A dataset with no links yields `[datasetId]`. Walking stops at the first
   * id already visited, so a corrupted (cyclic) state file cannot loop.
   */
  chainOf(datasetId: string): string[] {
    const visited = new Set<string>([datasetId]);

    const walk = (links: ReadonlyMap<string, string>): string[] => {
      const ids: string[] = [];
      let next = links.get(datasetId);
      while (next !== undefined && !visited.has(next)) {
        visited.add(next);
        ids.push(next);
        next = links.get(next);
      }
      return ids;
    };

    const older = walk(this.predecessors);
    const newer = walk(this.successors);

    return [...older.reverse(), datasetId, ...newer];
  }

  private ancestorsOf(datasetId: string): string[] {
    const chain = this.chainOf(datasetId);
    return chain.slice(0, chain.indexOf(datasetId));
  }

  private persistOrUndo(undo: () => void): void {
    try {
      this.stateIO.writeJson<ChainState>(CHAIN_FILE, Object.fromEntries(this.predecessors));
    } catch (err: unknown) {
      undo();
      throw err;
    }
  }
}
