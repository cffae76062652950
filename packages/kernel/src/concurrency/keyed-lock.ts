/**
 * Registry Kernel — Keyed Lock
 *
 * Per-key mutual exclusion for async operations within one process.
 *
 * Each key has a FIFO queue: a caller waits for everyone who asked for the
 * key before it. Multi-key acquisition takes the keys in lexicographic order,
 * one after another, so two callers asking for overlapping key sets cannot
 * deadlock.
 *
 * Locks are held across awaits: the registry keeps a dataset's lock while it
 * waits on the Content Store.
 */

import { compareNames } from '../integrity/hash-verifier.js';

export class KeyedLock {
  /** Tail of each key's queue. Absent when nobody holds or waits for the key. */
  private readonly tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `fn` while holding every key in `keys`.
   *
   * Duplicate keys are collapsed. Locks are released in reverse order once
   * `fn` settles, whether it resolves or throws.
   */
  async runExclusive<T>(keys: ReadonlyArray<string>, fn: () => Promise<T> | T): Promise<T> {
    const ordered = [...new Set(keys)].sort(compareNames);
    const releases: Array<() => void> = [];
    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** True if some caller holds or waits for `key`. */
  isHeld(key: string): boolean {
    return this.tails.has(key);
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}
