/**
 * Registry Kernel — Dataset Types
 *
 * A Dataset is one version of a scientific data container: descriptive
 * metadata taken from the container's own `content.json` / `meta.json`, a
 * manifest of file entries whose bytes live in the Content Store, and the
 * registry's bookkeeping (ownership, completion, hash, chain link, tombstone).
 *
 * Dataset values handed out by the registry are snapshots. They are never
 * mutated in place; every state transition produces a new value.
 */

// ---------------------------------------------------------------------------
// JSON values (inline previews)
// ---------------------------------------------------------------------------

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Container bookkeeping
// ---------------------------------------------------------------------------

/** The container type declared in `content.json` (`containerType`). */
export interface ContainerType {
  readonly name: string;
  readonly version?: string | undefined;
  readonly id?: string | undefined;
}

/** An entry of `content.json` `usedSoftware`. */
export interface SoftwareReference {
  readonly name: string;
  readonly version?: string | undefined;
  readonly id?: string | undefined;
}

/**
 * Normalized container metadata, as produced by validateContainerMetadata().
 *
 * Field names are snake_case regardless of the container's camelCase form.
 */
export interface DatasetMetadata {
  readonly title: string;
  readonly author: string;
  readonly email: string;
  readonly organization?: string | undefined;
  readonly comment?: string | undefined;
  readonly description?: string | undefined;
  readonly license?: string | undefined;
  readonly doi?: string | undefined;
  readonly timestamp?: string | undefined;
  readonly keywords: ReadonlyArray<string>;
  readonly used_software: ReadonlyArray<SoftwareReference>;
  readonly static: boolean;
  readonly model_version: string;
  readonly container_type: ContainerType;
  /** ISO 8601, from the container. */
  readonly created: string;
  /** ISO 8601, from the container. */
  readonly modified: string;
  /** The uuid the producer stamped on the container. Informational only. */
  readonly container_uuid?: string | undefined;
  /** Predecessor declared by the container itself (`content.json` `replaces`). */
  readonly replaces?: string | undefined;
}

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

/**
 * One file of a dataset's manifest.
 *
 * `digest` is the SHA-256 of the entry's bytes, recorded when the entry is
 * appended. It lets an integrity failure name the entry that no longer
 * matches. `preview` is an optional small inline rendering (parsed JSON for
 * `.json` files) and is never part of the payload hash.
 */
export interface FileEntry {
  readonly name: string;
  readonly size: number;
  readonly content_reference: string;
  readonly digest: string;
  readonly preview?: JsonValue | undefined;
}

// ---------------------------------------------------------------------------
// Dataset
// ---------------------------------------------------------------------------

export interface Dataset extends Omit<DatasetMetadata, 'replaces'> {
  /** UUIDv4 allocated by the registry. Immutable. */
  readonly id: string;
  /** User id of the uploader. Holds read and write implicitly. */
  readonly owner: string;
  /** Total bytes over all manifest entries. */
  readonly size: number;
  /** ISO 8601, set once at beginUpload. */
  readonly upload_time: string;
  /** ISO 8601, set when the upload completes. Null while incomplete. */
  readonly storage_time: string | null;
  /** false → true exactly once. */
  readonly complete: boolean;
  /** Payload digest, set at completion. Null while incomplete. */
  readonly hash: string | null;
  /** Id of the dataset this one supersedes, if any. */
  readonly replaces: string | null;
  readonly content: ReadonlyArray<FileEntry>;
  /** Monotonic tombstone. */
  readonly invalidated: boolean;
}

// ---------------------------------------------------------------------------
// Upload input
// ---------------------------------------------------------------------------

/** The two JSON documents of a container, before validation. */
export interface ContainerDocuments {
  readonly content: unknown;
  readonly meta: unknown;
}

/** A file whose bytes the registry should put into the Content Store. */
export interface InlineFileInput {
  readonly name: string;
  readonly data: Uint8Array;
  readonly preview?: JsonValue | undefined;
}

/** A file whose bytes were already put into the Content Store by the caller. */
export interface StoredFileInput {
  readonly name: string;
  readonly content_reference: string;
  readonly size: number;
  readonly preview?: JsonValue | undefined;
}

export type FileInput = InlineFileInput | StoredFileInput;

export function isInlineFileInput(input: FileInput): input is InlineFileInput {
  return 'data' in input;
}
