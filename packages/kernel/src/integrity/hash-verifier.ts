/**
 * Registry Kernel — Hash Verifier
 *
 * Computes the payload digest of a dataset manifest and checks it against a
 * claimed digest.
 *
 * Canonical serialization (the input to SHA-256):
 *   - entries sorted by name (UTF-16 code unit order, not locale order)
 *   - per entry: u64be(byteLength(name)) ‖ name (UTF-8) ‖ u64be(size) ‖ bytes
 *
 * Sorting happens here, at the verifier boundary, so the digest is the same
 * for every permutation of manifest append order. Inline previews are not
 * part of the serialization.
 *
 * The verifier reads bytes through the Content Store and never mutates
 * anything.
 */

import { createHash, type Hash } from 'node:crypto';
import type { ContentStore } from '../adapters/index.js';
import type { IntegrityFailure } from '../errors.js';
import { StorageError } from '../errors.js';
import type { FileEntry } from '../types/dataset.js';

/** The manifest fields the verifier reads. */
export type HashableEntry = Pick<FileEntry, 'name' | 'size' | 'content_reference' | 'digest'>;

export interface IntegrityReport {
  /** True iff no entry failed and computed === expected. */
  readonly ok: boolean;
  /** The claimed digest, normalized to lowercase. */
  readonly expected: string;
  readonly computed: string;
  readonly failures: ReadonlyArray<IntegrityFailure>;
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** Lowercase hex SHA-256 of a byte array. Used for per-entry digests. */
export function digestBytes(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function normalizeDigest(digest: string): string {
  return digest.trim().toLowerCase();
}

function lengthPrefix(n: number): Buffer {
  const buf = Buffer.alloc(8);
  buf.writeBigUInt64BE(BigInt(n));
  return buf;
}

function frame(hash: Hash, name: string, data: Uint8Array): void {
  const nameBytes = Buffer.from(name, 'utf-8');
  hash.update(lengthPrefix(nameBytes.byteLength));
  hash.update(nameBytes);
  hash.update(lengthPrefix(data.byteLength));
  hash.update(data);
}

// ---------------------------------------------------------------------------
// Digest computation
// ---------------------------------------------------------------------------

/**
 * Compute the payload digest of in-memory files.
 *
 * Produces the same value as computeManifestDigest() over a manifest holding
 * the same names and bytes. Clients use it to derive the claimed hash they
 * pass to completeUpload.
 */
export function digestPayload(
  files: ReadonlyArray<{ readonly name: string; readonly data: Uint8Array }>,
): string {
  const hash = createHash('sha256');
  for (const file of [...files].sort((a, b) => compareNames(a.name, b.name))) {
    frame(hash, file.name, file.data);
  }
  return hash.digest('hex');
}

/**
 * Read every entry's bytes from the store, hash them canonically, and
 * collect per-entry failures.
 *
 * A missing entry contributes nothing to the digest, so the computed digest
 * cannot match any honest claim once an entry has gone missing.
 *
 * @throws {StorageError} If the store rejects a read
 */
async function inspect(
  entries: ReadonlyArray<HashableEntry>,
  store: ContentStore,
): Promise<{ computed: string; failures: IntegrityFailure[] }> {
  const hash = createHash('sha256');
  const failures: IntegrityFailure[] = [];

  for (const entry of [...entries].sort((a, b) => compareNames(a.name, b.name))) {
    let data: Uint8Array | null;
    try {
      data = await store.get(entry.content_reference);
    } catch (err: unknown) {
      throw new StorageError(`Reading ${entry.name} (${entry.content_reference}) failed`, err);
    }

    if (data === null) {
      failures.push({ name: entry.name, reason: 'missing', expected: entry.content_reference, actual: null });
      continue;
    }
    if (data.byteLength !== entry.size) {
      failures.push({
        name: entry.name,
        reason: 'size_mismatch',
        expected: String(entry.size),
        actual: String(data.byteLength),
      });
    } else {
      const actual = digestBytes(data);
      if (actual !== entry.digest) {
        failures.push({ name: entry.name, reason: 'digest_mismatch', expected: entry.digest, actual });
      }
    }
    frame(hash, entry.name, data);
  }

  return { computed: hash.digest('hex'), failures };
}

/**
 * Compute the payload digest of a stored manifest.
 *
 * @throws {StorageError} If the store rejects a read
 */
export async function computeManifestDigest(
  entries: ReadonlyArray<HashableEntry>,
  store: ContentStore,
): Promise<string> {
  return (await inspect(entries, store)).computed;
}

/**
 * Compare a manifest's stored bytes against a claimed payload digest.
 *
 * @throws {StorageError} If the store rejects a read
 */
export async function verifyManifest(
  entries: ReadonlyArray<HashableEntry>,
  claimedHash: string,
  store: ContentStore,
): Promise<IntegrityReport> {
  const expected = normalizeDigest(claimedHash);
  const { computed, failures } = await inspect(entries, store);
  return {
    ok: failures.length === 0 && computed === expected,
    expected,
    computed,
    failures,
  };
}
