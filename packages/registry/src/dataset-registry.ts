/**
 * Dataset Registry — Registry Facade
 *
 * The single entry point for dataset lifecycle operations. Every operation
 * takes the requesting user explicitly; there is no ambient identity.
 *
 * Request pipeline, per operation:
 *   1. lock     mutating operations take the dataset's KeyedLock entry, then
 *               the StateIO state lock, and re-read state from it
 *   2. gate     unknown dataset → NotFound; frozen dataset → ImmutableError
 *               (mutations only); missing permission → Forbidden
 *   3. work     Content Store I/O and hash verification (all awaits)
 *   4. apply    one synchronous state transition, persisted before return
 *
 * Every gate decision is audited (Permit / Deny); every permitted request
 * ends in Applied or Failed. Cancellation via AbortSignal is honoured
 * between steps 3 and 4, so a cancelled request never leaves a partial
 * transition behind.
 *
 * Reads re-read state without the state lock. Several registries, in one
 * process or many, may share one StateIO's storage.
 *
 * Datasets handed to callers are frozen deep copies.
 */

import { randomUUID } from 'node:crypto';
import type {
  AuditSink,
  AuditSubject,
  ContainerDocuments,
  ContentStore,
  Dataset,
  FileEntry,
  FileInput,
  GroupResolver,
  IntegrityReport,
  PermissionGrant,
  PermissionListing,
  RegistryErrorCode,
  RegistryOperation,
} from '@sciregistry/kernel';
import {
  AuditLogger,
  CancelledError,
  ChainConflictError,
  digestBytes,
  ForbiddenError,
  ImmutableError,
  IntegrityError,
  isInlineFileInput,
  KeyedLock,
  NotFoundError,
  normalizeDigest,
  Operation,
  StorageError,
  user,
  validateContainerMetadata,
  ValidationError,
  verifyManifest,
} from '@sciregistry/kernel';
import type { StateIO } from '@sciregistry/runtime-host';
import { DEFAULT_REGISTRY_CONFIG } from '@sciregistry/runtime-host';
import { DatasetStore } from './dataset-store.js';
import { entryNameProblems, jsonPreview } from './manifest.js';
import { PermissionMatrix } from './permission-matrix.js';
import { VersionChain } from './version-chain.js';

const DIGEST_PATTERN = /^[0-9a-f]{64}$/;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface DatasetRegistryOptions {
  /** Persistence for datasets.json, permissions.json and chain.json. */
  readonly stateIO: StateIO;
  readonly contentStore: ContentStore;
  readonly groups: GroupResolver;
  /** Audit persistence. Without a sink, auditing is a no-op. */
  readonly auditSink?: AuditSink | undefined;
  /** Default: wall clock. */
  readonly clock?: (() => Date) | undefined;
  /** Default: crypto.randomUUID. */
  readonly newId?: (() => string) | undefined;
  /** `.json` entries up to this many bytes get an inline preview. 0 disables. */
  readonly previewMaxBytes?: number | undefined;
}

export interface OperationOptions {
  readonly signal?: AbortSignal | undefined;
}

export class DatasetRegistry {
  private readonly stateIO: StateIO;
  private readonly datasets: DatasetStore;
  private readonly permissions: PermissionMatrix;
  private readonly chain: VersionChain;
  private readonly content: ContentStore;
  private readonly audit: AuditLogger;
  private readonly locks = new KeyedLock();
  private readonly clock: () => Date;
  private readonly newId: () => string;
  private readonly previewMaxBytes: number;

  constructor(options: DatasetRegistryOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.newId ?? (() => randomUUID());
    this.previewMaxBytes = options.previewMaxBytes ?? DEFAULT_REGISTRY_CONFIG.previewMaxBytes;
    this.content = options.contentStore;
    this.stateIO = options.stateIO;
    this.audit = new AuditLogger(options.auditSink, () => this.clock().toISOString());
    this.datasets = new DatasetStore(options.stateIO);
    this.permissions = new PermissionMatrix(options.stateIO, options.groups);
    this.chain = new VersionChain(options.stateIO, (id) => this.datasets.has(id));
  }

  // -------------------------------------------------------------------------
  // Upload lifecycle
  // -------------------------------------------------------------------------

  /**
   * Register a new, incomplete dataset owned by `requester`.
   *
   * The predecessor is `declaredPredecessorId` if given, else the `replaces`
   * field of the container's content document. Creating the dataset, its
   * permission row and its chain link is atomic.
   *
   * @returns The new dataset's id
   * @throws {ValidationError} If the container metadata is invalid, or the
   *   allocated id is already in use
   * @throws {ChainConflictError} If the predecessor is unknown or already replaced
   * @throws {ForbiddenError} If the requester lacks write on the predecessor
   */
  async beginUpload(
    requester: string,
    documents: ContainerDocuments,
    declaredPredecessorId?: string,
  ): Promise<string> {
    requireRequester(requester);
    const subject: AuditSubject = { requester, operation: 'beginUpload', datasetId: null };

    const validated = validateContainerMetadata(documents);
    if (!validated.ok) {
      const err = new ValidationError(validated.errors);
      this.audit.failed(subject, err);
      throw err;
    }
    const { replaces: containerPredecessor, ...descriptive } = validated.value;
    const predecessorId = nonEmpty(declaredPredecessorId) ?? nonEmpty(containerPredecessor);

    const id = this.newId();
    const keys = predecessorId === undefined ? [id] : [id, predecessorId];

    return this.exclusive(keys, async () => {
      const createdSubject: AuditSubject = { ...subject, datasetId: id };
      if (this.isKnownId(id)) {
        const err = ValidationError.single('id', `dataset ${id} already exists`);
        this.audit.failed(createdSubject, err);
        throw err;
      }

      if (predecessorId !== undefined) {
        const predecessorSubject: AuditSubject = { ...subject, datasetId: predecessorId };
        if (!this.datasets.has(predecessorId)) {
          this.audit.deny(predecessorSubject, 'ChainConflict', 'predecessor does not exist');
          throw new ChainConflictError(`Predecessor ${predecessorId} does not exist`);
        }
        if (!(await this.permissions.check(predecessorId, user(requester), Operation.Write))) {
          this.audit.deny(predecessorSubject, 'Forbidden', 'write on predecessor required');
          throw new ForbiddenError(`${requester} may not replace dataset ${predecessorId}`);
        }
        this.audit.permit(predecessorSubject, `replace with ${id}`);
      }

      const created: Dataset = {
        ...descriptive,
        id,
        owner: requester,
        size: 0,
        upload_time: this.clock().toISOString(),
        storage_time: null,
        complete: false,
        hash: null,
        replaces: predecessorId ?? null,
        content: [],
        invalidated: false,
      };

      // The dataset record goes last: until it exists, readers see NotFound.
      const undo: Array<() => void> = [];
      try {
        this.permissions.registerOwner(id, requester);
        undo.push(() => this.permissions.forget(id));
        if (predecessorId !== undefined) {
          this.chain.link(id, predecessorId);
          undo.push(() => this.chain.unlink(id));
        }
        this.datasets.insert(created);
      } catch (err: unknown) {
        for (const step of undo.reverse()) {
          step();
        }
        this.audit.failed(createdSubject, err);
        throw err;
      }

      this.audit.applied(
        createdSubject,
        predecessorId === undefined ? created.title : `${created.title} (replaces ${predecessorId})`,
      );
      return id;
    });
  }

  /**
   * Append one file to an incomplete dataset's manifest.
   *
   * Inline bytes are put into the Content Store first; for an already-stored
   * reference, the stored size must match the declared one.
   *
   * Appending a name already in the manifest with the same bytes stores them
   * again and returns the existing entry, so an upload whose stored bytes
   * were lost can be repaired before completion.
   *
   * @returns The manifest entry as recorded
   * @throws {ImmutableError} If the dataset is complete or invalidated
   * @throws {ValidationError} On an invalid name, a name already recorded with
   *   other bytes, or a stored reference that is missing or of the wrong size
   * @throws {IntegrityError} If a re-appended reference still holds other bytes
   * @throws {StorageError} If the Content Store fails
   * @throws {CancelledError} If `signal` aborted before the entry was recorded
   */
  async appendFile(
    datasetId: string,
    requester: string,
    file: FileInput,
    opts: OperationOptions = {},
  ): Promise<FileEntry> {
    const subject = this.subject(requester, 'appendFile', datasetId);

    return this.exclusive([datasetId], async () => {
      await this.gateMutation(subject, Operation.Write);

      return this.attempt(subject, async () => {
        const current = this.requireDataset(datasetId);
        const nameProblems = entryNameProblems(file.name);
        if (nameProblems.length > 0) {
          throw new ValidationError(nameProblems);
        }
        const existing = current.content.find((e) => e.name === file.name);
        if (existing !== undefined) {
          return this.restore(subject, current, existing, file, opts.signal);
        }

        const stored = await this.store(file);
        const preview = file.preview ?? jsonPreview(file.name, stored.data, this.previewMaxBytes);
        const entry: FileEntry = {
          name: file.name,
          size: stored.data.byteLength,
          content_reference: stored.reference,
          digest: digestBytes(stored.data),
          ...(preview === undefined ? {} : { preview }),
        };

        throwIfAborted(opts.signal, 'appendFile');
        this.datasets.update({
          ...current,
          content: [...current.content, entry],
          size: current.size + entry.size,
        });
        this.audit.applied(subject, `${entry.name} (${entry.size} bytes)`);
        return snapshot(entry);
      });
    });
  }

  /**
   * Verify the manifest against `claimedHash` and mark the dataset complete.
   *
   * On a mismatch the dataset stays incomplete and the call may be retried.
   *
   * @returns The completed dataset
   * @throws {ImmutableError} If the dataset is complete or invalidated
   * @throws {ValidationError} If the manifest is empty or the hash is malformed
   * @throws {IntegrityError} If the stored payload does not match `claimedHash`
   * @throws {CancelledError} If `signal` aborted before completion was recorded
   */
  async completeUpload(
    datasetId: string,
    requester: string,
    claimedHash: string,
    opts: OperationOptions = {},
  ): Promise<Dataset> {
    const subject = this.subject(requester, 'completeUpload', datasetId);

    return this.exclusive([datasetId], async () => {
      await this.gateMutation(subject, Operation.Write);

      return this.attempt(subject, async () => {
        const current = this.requireDataset(datasetId);
        if (current.content.length === 0) {
          throw ValidationError.single('content', 'cannot complete a dataset without files');
        }
        if (!DIGEST_PATTERN.test(normalizeDigest(claimedHash))) {
          throw ValidationError.single('hash', 'expected a hex SHA-256 digest');
        }

        const report = await verifyManifest(current.content, claimedHash, this.content);
        if (!report.ok) {
          throw new IntegrityError(`dataset ${datasetId}`, report.expected, report.computed, report.failures);
        }

        throwIfAborted(opts.signal, 'completeUpload');
        const completed: Dataset = {
          ...current,
          complete: true,
          hash: report.computed,
          storage_time: this.clock().toISOString(),
          size: current.content.reduce((sum, e) => sum + e.size, 0),
        };
        this.datasets.update(completed);
        this.audit.applied(subject, report.computed);
        return snapshot(completed);
      });
    });
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /**
   * @throws {NotFoundError} If the dataset does not exist
   * @throws {ForbiddenError} If the requester lacks read
   */
  async read(datasetId: string, requester: string): Promise<Dataset> {
    const subject = this.subject(requester, 'read', datasetId);
    this.refresh();
    return snapshot(await this.gate(subject, Operation.Read));
  }

  /**
   * Datasets the requester can read, newest upload first, excluding
   * invalidated ones.
   *
   * Each iteration takes a fresh snapshot of the registry, so the iterable
   * can be consumed more than once and reflects changes between runs.
   */
  listVisible(requester: string): AsyncIterable<Dataset> {
    const subject = this.subject(requester, 'listVisible', null);
    return {
      [Symbol.asyncIterator]: () => this.visibleTo(subject),
    };
  }

  private async *visibleTo(subject: AuditSubject): AsyncGenerator<Dataset, void, undefined> {
    this.refresh();
    const candidates = [...this.datasets.all()]
      .reverse()
      .filter((d) => !d.invalidated)
      .sort((a, b) => (a.upload_time < b.upload_time ? 1 : a.upload_time > b.upload_time ? -1 : 0));
    this.audit.permit(subject, `${candidates.length} candidates`);

    for (const dataset of candidates) {
      if (await this.permissions.check(dataset.id, user(subject.requester), Operation.Read)) {
        yield snapshot(dataset);
      }
    }
  }

  /**
   * @throws {NotFoundError} If the dataset does not exist
   * @throws {ForbiddenError} If the requester lacks read
   */
  async listPermissions(datasetId: string, requester: string): Promise<PermissionListing> {
    const subject = this.subject(requester, 'listPermissions', datasetId);
    this.refresh();
    await this.gate(subject, Operation.Read);
    return snapshot(this.permissions.list(datasetId));
  }

  /**
   * The version chain the dataset belongs to, oldest first.
   *
   * @throws {NotFoundError} If the dataset does not exist
   * @throws {ForbiddenError} If the requester lacks read
   */
  async chainOf(datasetId: string, requester: string): Promise<ReadonlyArray<string>> {
    const subject = this.subject(requester, 'chainOf', datasetId);
    this.refresh();
    await this.gate(subject, Operation.Read);
    return Object.freeze(this.chain.chainOf(datasetId));
  }

  /**
   * Re-check a complete dataset's stored bytes against its recorded hash.
   *
   * A mismatch is reported, not thrown.
   *
   * @throws {ValidationError} If the dataset is not complete
   * @throws {StorageError} If the Content Store fails
   */
  async verify(datasetId: string, requester: string): Promise<IntegrityReport> {
    const subject = this.subject(requester, 'verify', datasetId);
    this.refresh();
    const dataset = await this.gate(subject, Operation.Read);

    return this.attempt(subject, async () => {
      if (!dataset.complete || dataset.hash === null) {
        throw ValidationError.single('complete', `dataset ${datasetId} is not complete`);
      }
      const report = await verifyManifest(dataset.content, dataset.hash, this.content);
      this.audit.applied(subject, report.ok ? 'intact' : `${report.failures.length} failing entries`);
      return snapshot(report);
    });
  }

  /**
   * Bytes of one manifest entry, checked against the entry's recorded digest.
   *
   * @throws {NotFoundError} If the dataset is unknown, invalidated or
   *   incomplete, or has no entry of that name
   * @throws {IntegrityError} If the stored bytes are missing or altered
   */
  async download(datasetId: string, requester: string, name: string): Promise<Uint8Array> {
    const subject = this.subject(requester, 'download', datasetId);
    this.refresh();
    const dataset = await this.gate(subject, Operation.Read);

    return this.attempt(subject, async () => {
      if (dataset.invalidated || !dataset.complete) {
        throw new NotFoundError(`Dataset ${datasetId} is not available for download`);
      }
      const entry = dataset.content.find((e) => e.name === name);
      if (entry === undefined) {
        throw new NotFoundError(`Dataset ${datasetId} has no file ${name}`);
      }

      const data = await this.fetch(entry.content_reference, entry.name);
      if (data === null) {
        throw new IntegrityError(entry.name, entry.digest, '', [
          { name: entry.name, reason: 'missing', expected: entry.content_reference, actual: null },
        ]);
      }
      const actual = digestBytes(data);
      if (actual !== entry.digest) {
        throw new IntegrityError(entry.name, entry.digest, actual, [
          { name: entry.name, reason: 'digest_mismatch', expected: entry.digest, actual },
        ]);
      }
      this.audit.applied(subject, `${entry.name} (${data.byteLength} bytes)`);
      return data;
    });
  }

  // -------------------------------------------------------------------------
  // Administrative transitions
  // -------------------------------------------------------------------------

  /**
   * Tombstone a dataset. Idempotent.
   *
   * @throws {NotFoundError} If the dataset does not exist
   * @throws {ForbiddenError} If the requester lacks write
   */
  async invalidate(datasetId: string, requester: string): Promise<void> {
    const subject = this.subject(requester, 'invalidate', datasetId);

    await this.exclusive([datasetId], async () => {
      const current = await this.gate(subject, Operation.Write);
      if (current.invalidated) {
        this.audit.applied(subject, 'already invalidated');
        return;
      }
      this.attemptSync(subject, () => {
        this.datasets.update({ ...current, invalidated: true });
      });
      this.audit.applied(subject);
    });
  }

  /**
   * Apply a batch of grants and revokes. Only the owner may do this.
   *
   * @returns The dataset's permissions after the change
   * @throws {ForbiddenError} If the requester is not the owner
   * @throws {ValidationError} If the batch is malformed; nothing is applied
   */
  async updatePermissions(
    datasetId: string,
    requester: string,
    grants: ReadonlyArray<PermissionGrant>,
    revokes: ReadonlyArray<PermissionGrant>,
  ): Promise<PermissionListing> {
    const subject = this.subject(requester, 'updatePermissions', datasetId);

    return this.exclusive([datasetId], async () => {
      const dataset = this.datasets.get(datasetId);
      if (dataset === undefined) {
        this.refuse(subject, new NotFoundError(`Dataset ${datasetId} not found`));
      }
      if (dataset.owner !== requester) {
        this.refuse(subject, new ForbiddenError(`Only the owner may change permissions of ${datasetId}`));
      }
      this.audit.permit(subject);

      const result = this.attemptSync(subject, () =>
        this.permissions.applyBatch(datasetId, grants, revokes),
      );
      this.audit.applied(subject, `+${result.granted} -${result.revoked}`);
      return snapshot(this.permissions.list(datasetId));
    });
  }

  // -------------------------------------------------------------------------
  // Locking
  // -------------------------------------------------------------------------

  /** Run a mutation under the dataset keys and the state lock, on fresh state. */
  private exclusive<T>(keys: ReadonlyArray<string>, work: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(keys, () =>
      this.stateIO.withLock(async () => {
        this.refresh();
        return work();
      }),
    );
  }

  private refresh(): void {
    this.datasets.reload();
    this.permissions.reload();
    this.chain.reload();
  }

  /** Whether any part of the registry's state already mentions `id`. */
  private isKnownId(id: string): boolean {
    return (
      this.datasets.has(id) ||
      this.permissions.ownerOf(id) !== null ||
      this.chain.predecessorOf(id) !== null ||
      this.chain.successorOf(id) !== null
    );
  }

  // -------------------------------------------------------------------------
  // Gate
  // -------------------------------------------------------------------------

  private subject(
    requester: string,
    operation: RegistryOperation,
    datasetId: string | null,
  ): AuditSubject {
    requireRequester(requester);
    return { requester, operation, datasetId };
  }

  /**
   * Look up the subject's dataset and check the requester's permission.
   * Refusals are audited as Deny; a pass is audited as Permit.
   */
  private async gate(subject: AuditSubject, operation: Operation): Promise<Dataset> {
    const datasetId = subject.datasetId ?? '';
    const dataset = this.datasets.get(datasetId);
    if (dataset === undefined) {
      this.refuse(subject, new NotFoundError(`Dataset ${datasetId} not found`));
    }
    if (!(await this.permissions.check(datasetId, user(subject.requester), operation))) {
      this.refuse(
        subject,
        new ForbiddenError(`${subject.requester} may not ${operation} dataset ${datasetId}`),
      );
    }
    this.audit.permit(subject);
    return dataset;
  }

  /** gate(), with frozen datasets refused before the permission check. */
  private async gateMutation(subject: AuditSubject, operation: Operation): Promise<Dataset> {
    const dataset = this.datasets.get(subject.datasetId ?? '');
    if (dataset?.complete === true) {
      this.refuse(subject, new ImmutableError(`Dataset ${dataset.id} is complete`));
    }
    if (dataset?.invalidated === true) {
      this.refuse(subject, new ImmutableError(`Dataset ${dataset.id} is invalidated`));
    }
    return this.gate(subject, operation);
  }

  private refuse(subject: AuditSubject, err: NotFoundError | ForbiddenError | ImmutableError): never {
    const code: RegistryErrorCode = err.code;
    this.audit.deny(subject, code, err.message);
    throw err;
  }

  /** Run permitted work; audit a failure and rethrow it. */
  private async attempt<T>(subject: AuditSubject, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err: unknown) {
      this.audit.failed(subject, err);
      throw err;
    }
  }

  private attemptSync<T>(subject: AuditSubject, work: () => T): T {
    try {
      return work();
    } catch (err: unknown) {
      this.audit.failed(subject, err);
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Content Store access
  // -------------------------------------------------------------------------

  private requireDataset(datasetId: string): Dataset {
    const dataset = this.datasets.get(datasetId);
    if (dataset === undefined) {
      throw new NotFoundError(`Dataset ${datasetId} not found`);
    }
    return dataset;
  }

  /** Put inline bytes, or fetch and size-check an existing reference. */
  private async store(file: FileInput): Promise<{ reference: string; data: Uint8Array }> {
    if (isInlineFileInput(file)) {
      try {
        return { reference: await this.content.put(file.data), data: file.data };
      } catch (err: unknown) {
        throw new StorageError(`Storing ${file.name} failed`, err);
      }
    }

    if (!Number.isSafeInteger(file.size) || file.size < 0) {
      throw ValidationError.single('file.size', 'size must be a non-negative integer');
    }
    const data = await this.fetch(file.content_reference, file.name);
    if (data === null) {
      throw ValidationError.single(
        'file.content_reference',
        `nothing is stored under ${file.content_reference}`,
      );
    }
    if (data.byteLength !== file.size) {
      throw ValidationError.single(
        'file.size',
        `declared ${file.size} bytes but ${data.byteLength} are stored`,
      );
    }
    return { reference: file.content_reference, data };
  }

  /**
   * appendFile for a name already in the manifest: accepted only when `file`
   * carries the recorded bytes, which are then stored again.
   */
  private async restore(
    subject: AuditSubject,
    current: Dataset,
    existing: FileEntry,
    file: FileInput,
    signal: AbortSignal | undefined,
  ): Promise<FileEntry> {
    const sameBytes = isInlineFileInput(file)
      ? file.data.byteLength === existing.size && digestBytes(file.data) === existing.digest
      : file.content_reference === existing.content_reference && file.size === existing.size;
    if (!sameBytes) {
      throw ValidationError.single('file.name', `${file.name} is already in the manifest with other content`);
    }

    const stored = await this.store(file);
    const actual = digestBytes(stored.data);
    if (actual !== existing.digest) {
      throw new IntegrityError(existing.name, existing.digest, actual, [
        { name: existing.name, reason: 'digest_mismatch', expected: existing.digest, actual },
      ]);
    }

    throwIfAborted(signal, 'appendFile');
    if (stored.reference === existing.content_reference) {
      this.audit.applied(subject, `${existing.name} stored again`);
      return snapshot(existing);
    }
    const moved: FileEntry = { ...existing, content_reference: stored.reference };
    this.datasets.update({
      ...current,
      content: current.content.map((e) => (e.name === moved.name ? moved : e)),
    });
    this.audit.applied(subject, `${moved.name} stored again under ${moved.content_reference}`);
    return snapshot(moved);
  }

  private async fetch(reference: string, name: string): Promise<Uint8Array | null> {
    try {
      return await this.content.get(reference);
    } catch (err: unknown) {
      throw new StorageError(`Reading ${name} (${reference}) failed`, err);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function requireRequester(requester: string): void {
  if (requester.trim() === '') {
    throw ValidationError.single('requester', 'requester must not be empty');
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function throwIfAborted(signal: AbortSignal | undefined, operation: RegistryOperation): void {
  if (signal?.aborted === true) {
    throw new CancelledError(operation);
  }
}

/** Deep copy, deep frozen. */
function snapshot<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}
