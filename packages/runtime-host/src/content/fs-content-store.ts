/**
 * Registry Runtime Host — Filesystem Content Store
 *
 * Content-addressed blob storage on the local filesystem. A payload's
 * reference is the lowercase hex SHA-256 of its bytes; the payload lives at
 *
 *   <root>/<ref[0..2]>/<ref[2..]>
 *
 * Identical payloads share one file. Every put writes the bytes again, so a
 * damaged or truncated file is replaced by a correct copy. A write goes to a
 * uniquely named temporary file that is then renamed into place, so `put`
 * resolves only once the bytes are complete on disk and readers never see a
 * partial payload.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { digestBytes } from '@sciregistry/kernel';
import type { ContentStore } from '@sciregistry/kernel';
import { isNodeError } from '../state/state-io.js';

const REFERENCE_PATTERN = /^[0-9a-f]{64}$/;

export class FsContentStore implements ContentStore {
  constructor(private readonly root: string) {}

  async put(data: Uint8Array): Promise<string> {
    const reference = digestBytes(data);
    const target = this.pathOf(reference);
    await mkdir(dirname(target), { recursive: true });
    const tmp = `${target}.${randomUUID()}.tmp`;
    await writeFile(tmp, data);
    await rename(tmp, target);
    return reference;
  }

  async get(reference: string): Promise<Uint8Array | null> {
    if (!REFERENCE_PATTERN.test(reference)) return null;
    try {
      return await readFile(this.pathOf(reference));
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return null;
      throw err;
    }
  }

  async size(reference: string): Promise<number | null> {
    if (!REFERENCE_PATTERN.test(reference)) return null;
    try {
      return (await stat(this.pathOf(reference))).size;
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return null;
      throw err;
    }
  }

  private pathOf(reference: string): string {
    return join(this.root, reference.slice(0, 2), reference.slice(2));
  }
}
