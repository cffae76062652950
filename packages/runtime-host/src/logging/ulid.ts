/**
 * Registry Runtime Host — ULID Generator
 *
 * Universally Unique Lexicographically Sortable Identifier.
 *
 * ULID format: 26 characters, Crockford Base32 encoded.
 *   - 10 chars: 48-bit millisecond timestamp (lexicographically sortable)
 *   - 16 chars: 80-bit cryptographic random
 *
 * Used as event_id in audit.jsonl so that a log assembled from several
 * copies (backups, replicas) can be deduplicated on read.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

/** Crockford's Base32 alphabet. Excludes I, L, O, U. */
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

const BITS_PER_CHAR = 5;

/** ceil(48/5) */
const TIME_CHARS = 10;

/** ceil(80/5) */
const RANDOM_CHARS = 16;

const RANDOM_BYTES = 10;

/**
 * Encode a non-negative BigInt as exactly `length` Crockford Base32
 * characters, zero-padded on the left.
 */
function encodeCrockford(value: bigint, length: number): string {
  const chars: string[] = new Array<string>(length);
  let v = value;
  for (let i = length - 1; i >= 0; i--) {
    chars[i] = CROCKFORD_ALPHABET.charAt(Number(v & BigInt(0x1f)));
    v >>= BigInt(BITS_PER_CHAR);
  }
  return chars.join('');
}

export interface UlidSources {
  /** Milliseconds since the epoch. Default: Date.now */
  readonly now?: (() => number) | undefined;
  /** Returns `size` random bytes. Default: crypto.randomBytes */
  readonly random?: ((size: number) => Uint8Array) | undefined;
}

/**
 * Build a ULID generator over the given time and randomness sources.
 *
 * The random component is not incremented within one millisecond; ordering
 * within a millisecond is arbitrary.
 */
export function createUlid(sources: UlidSources = {}): () => string {
  const now = sources.now ?? Date.now;
  const random = sources.random ?? ((size: number): Uint8Array => randomBytes(size));

  return () => {
    const timePart = encodeCrockford(BigInt(now()), TIME_CHARS);

    let randValue = BigInt(0);
    for (const byte of random(RANDOM_BYTES)) {
      randValue = (randValue << BigInt(8)) | BigInt(byte);
    }
    return timePart + encodeCrockford(randValue, RANDOM_CHARS);
  };
}

/**
 * Generate a new ULID string.
 *
 * @example
 * const id = ulid();
 * // e.g. '01JDKPF8X7M4VQN3BGHST6RWYZ'
 */
export const ulid: () => string = createUlid();
