/**
 * Shared fixtures for registry tests.
 *
 * Every registry built here runs on MemoryStateIO and MemoryContentStore with
 * a stepping clock and sequential ids, so tests are deterministic and do no
 * file I/O.
 */

import type { ContainerDocuments, Dataset, GroupResolver } from '@sciregistry/kernel';
import { digestPayload } from '@sciregistry/kernel';
import {
  AUDIT_LOG_FILE,
  FileAuditSink,
  MemoryContentStore,
  MemoryStateIO,
  StaticGroupResolver,
  readAuditLog,
} from '@sciregistry/runtime-host';
import type { AuditRecord } from '@sciregistry/runtime-host';
import { DatasetRegistry } from '../src/dataset-registry.js';

export const OWNER = 'uma';
export const OTHER = 'vera';

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function containerDocs(
  overrides: { content?: Record<string, unknown>; meta?: Record<string, unknown> } = {},
): ContainerDocuments {
  return {
    content: {
      modelVersion: '0.5.1',
      containerType: { name: 'TestContainer', version: '1.0' },
      created: '2026-01-05T10:00:00Z',
      modified: '2026-01-05T10:00:00Z',
      static: false,
      complete: true,
      ...overrides.content,
    },
    meta: {
      author: 'Uma Uploader',
      email: 'uma@example.org',
      title: 'Calibration run',
      ...overrides.meta,
    },
  };
}

/** A clock that advances one second on every call. */
export function steppingClock(start = '2026-03-01T12:00:00.000Z'): () => Date {
  let ms = Date.parse(start);
  return () => {
    const now = new Date(ms);
    ms += 1000;
    return now;
  };
}

export function sequentialIds(prefix = 'ds'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export interface Harness {
  readonly registry: DatasetRegistry;
  readonly stateIO: MemoryStateIO;
  readonly content: MemoryContentStore;
  /** Parsed audit log, oldest first. */
  auditRecords(): ReadonlyArray<AuditRecord>;
  /**
   * Another registry over the same state and content: as after a restart, or
   * as a second process sharing the home.
   */
  reopen(): DatasetRegistry;
}

export interface HarnessOptions {
  readonly groups?: GroupResolver;
  readonly content?: MemoryContentStore;
  readonly stateIO?: MemoryStateIO;
  readonly clock?: () => Date;
  readonly newId?: () => string;
  readonly previewMaxBytes?: number;
}

export function harness(opts: HarnessOptions = {}): Harness {
  const stateIO = opts.stateIO ?? new MemoryStateIO();
  const content = opts.content ?? new MemoryContentStore();
  const groups = opts.groups ?? new StaticGroupResolver();
  const clock = opts.clock ?? steppingClock();
  const newId = opts.newId ?? sequentialIds();
  let eventSeq = 0;
  const auditSink = new FileAuditSink(stateIO, () => `EVT${String(++eventSeq).padStart(6, '0')}`);

  const build = (): DatasetRegistry =>
    new DatasetRegistry({
      stateIO,
      contentStore: content,
      groups,
      auditSink,
      clock,
      newId,
      previewMaxBytes: opts.previewMaxBytes,
    });

  return {
    registry: build(),
    stateIO,
    content,
    auditRecords: () => readAuditLog(stateIO.readLogRaw(AUDIT_LOG_FILE)).records,
    reopen: build,
  };
}

export interface UploadFile {
  readonly name: string;
  readonly text: string;
}

/** beginUpload + appendFile for each file, without completing. */
export async function startUpload(
  registry: DatasetRegistry,
  files: ReadonlyArray<UploadFile>,
  opts: { requester?: string; predecessor?: string; docs?: ContainerDocuments } = {},
): Promise<string> {
  const requester = opts.requester ?? OWNER;
  const id = await registry.beginUpload(requester, opts.docs ?? containerDocs(), opts.predecessor);
  for (const file of files) {
    await registry.appendFile(id, requester, { name: file.name, data: bytes(file.text) });
  }
  return id;
}

export function payloadDigest(files: ReadonlyArray<UploadFile>): string {
  return digestPayload(files.map((f) => ({ name: f.name, data: bytes(f.text) })));
}

/** Upload and complete a dataset with the correct payload digest. */
export async function uploadComplete(
  registry: DatasetRegistry,
  files: ReadonlyArray<UploadFile>,
  opts: { requester?: string; predecessor?: string; docs?: ContainerDocuments } = {},
): Promise<Dataset> {
  const id = await startUpload(registry, files, opts);
  return registry.completeUpload(id, opts.requester ?? OWNER, payloadDigest(files));
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) {
    out.push(item);
  }
  return out;
}
