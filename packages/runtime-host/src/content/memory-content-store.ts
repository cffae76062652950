/**
 * Registry Runtime Host — In-memory Content Store
 *
 * Same referencing scheme as FsContentStore (SHA-256 hex of the bytes), kept
 * in a Map. Stored and returned arrays are copies, so callers cannot alter
 * stored bytes by mutating a buffer they handed in or got back.
 *
 * overwrite() and remove() exist so tests can simulate corruption and loss.
 */

import { digestBytes } from '@sciregistry/kernel';
import type { ContentStore } from '@sciregistry/kernel';

export class MemoryContentStore implements ContentStore {
  private readonly blobs: Map<string, Uint8Array> = new Map();

  async put(data: Uint8Array): Promise<string> {
    const reference = digestBytes(data);
    this.blobs.set(reference, Uint8Array.from(data));
    return reference;
  }

  async get(reference: string): Promise<Uint8Array | null> {
    const blob = this.blobs.get(reference);
    return blob === undefined ? null : Uint8Array.from(blob);
  }

  async size(reference: string): Promise<number | null> {
    return this.blobs.get(reference)?.byteLength ?? null;
  }

  /** Replace the bytes stored under a reference without re-keying them. */
  overwrite(reference: string, data: Uint8Array): void {
    this.blobs.set(reference, Uint8Array.from(data));
  }

  remove(reference: string): void {
    this.blobs.delete(reference);
  }

  get count(): number {
    return this.blobs.size;
  }
}
