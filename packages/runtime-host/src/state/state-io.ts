/**
 * Registry Runtime Host — StateIO
 *
 * The I/O abstraction through which every stateful registry component reads
 * and writes its JSON state file and appends to JSONL logs.
 *
 *   FileStateIO   — durable files under a registry home directory
 *   MemoryStateIO — in-memory, for tests and embedded use
 *
 * Components receive a StateIO at construction and never build paths
 * themselves. Two StateIO instances never see each other's files.
 */

import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { KeyedLock, StorageError } from '@sciregistry/kernel';

/** How long FileStateIO waits for another holder of the state lock. */
export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;

const LOCK_FILE = '.lock';
const LOCK_RETRY_MS = 15;

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson / writeJson address the `state/` subdirectory
 * - appendLine / readLogRaw address the `logs/` subdirectory
 * - writeJson replaces the whole file; a reader never sees half a write
 * - withLock is exclusive across every StateIO over the same storage, in
 *   this process or another; it is not reentrant
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns `fallback` if the file does not exist. T is trusted: callers own
   * the schema of what they persisted.
   *
   * @throws {SyntaxError} If the file exists but is not valid JSON
   */
  readJson<T>(filename: string, fallback: T): T;

  /** Serialize a value and replace the state file with it. */
  writeJson<T>(filename: string, value: T): void;

  /** Append one line (without trailing newline) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file; empty string if it does not exist. */
  readLogRaw(logfilename: string): string;

  /**
   * Run `work` holding the exclusive state lock. Read-check-write sequences
   * must re-read state inside it.
   *
   * @throws {StorageError} If the lock cannot be taken
   */
  withLock<T>(work: () => Promise<T>): Promise<T>;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable StateIO under a registry home directory.
 *
 *   <homeDir>/state/<filename>
 *   <homeDir>/logs/<logfilename>
 *
 * Directories are created on first write. writeJson goes through a temporary
 * file and a rename so a crash mid-write leaves the previous version intact.
 *
 * Synchronous: a state write has completed when the call returns, which is
 * what lets the registry apply a transition in one uninterrupted step.
 *
 * The state lock is `<homeDir>/state/.lock`, created exclusively and holding
 * the owner's pid. A lock whose owner process no longer exists is taken over.
 */
export class FileStateIO implements StateIO {
  private readonly local = new KeyedLock();

  constructor(
    private readonly homeDir: string,
    private readonly lockTimeoutMs: number = DEFAULT_LOCK_TIMEOUT_MS,
  ) {}

  readJson<T>(filename: string, fallback: T): T {
    const filePath = join(this.homeDir, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return fallback;
      }
      throw err;
    }
    return JSON.parse(raw) as T;
  }

  writeJson<T>(filename: string, value: T): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    const filePath = join(subDir, filename);
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(tmpPath, filePath);
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }

  withLock<T>(work: () => Promise<T>): Promise<T> {
    return this.local.runExclusive([LOCK_FILE], async () => {
      const lockPath = await this.acquireLockFile();
      try {
        return await work();
      } finally {
        rmSync(lockPath, { force: true });
      }
    });
  }

  private async acquireLockFile(): Promise<string> {
    const subDir = join(this.homeDir, 'state');
    const lockPath = join(subDir, LOCK_FILE);
    const deadline = Date.now() + this.lockTimeoutMs;
    mkdirSync(subDir, { recursive: true });

    for (;;) {
      try {
        writeFileSync(lockPath, String(process.pid), { encoding: 'utf-8', flag: 'wx' });
        return lockPath;
      } catch (err: unknown) {
        if (!isNodeError(err, 'EEXIST')) {
          throw new StorageError(`Creating ${lockPath} failed`, err);
        }
      }

      const holder = readLockHolder(lockPath);
      if (holder !== null && holder !== process.pid && !isProcessAlive(holder)) {
        rmSync(lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new StorageError(
          'State lock unavailable',
          `${lockPath} still held by process ${holder ?? 'unknown'} after ${this.lockTimeoutMs} ms`,
        );
      }
      await delay(LOCK_RETRY_MS);
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO.
 *
 * Values round-trip through JSON on write so tests observe the same
 * serialization effects as FileStateIO (undefined properties vanish, etc.).
 */
export class MemoryStateIO implements StateIO {
  private readonly files: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();
  private readonly lock = new KeyedLock();

  readJson<T>(filename: string, fallback: T): T {
    const raw = this.files.get(filename);
    return raw === undefined ? fallback : (JSON.parse(raw) as T);
  }

  writeJson<T>(filename: string, value: T): void {
    this.files.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }

  withLock<T>(work: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(['state'], work);
  }

  /** Lines appended to a log. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  /** Whether a state file has been written. Test helper; not part of StateIO. */
  has(filename: string): boolean {
    return this.files.has(filename);
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Pid recorded in a lock file; null if the file is gone or not yet written. */
function readLockHolder(lockPath: string): number | null {
  let raw: string;
  try {
    raw = readFileSync(lockPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }
  const pid = Number.parseInt(raw, 10);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    return !isNodeError(err, 'ESRCH');
  }
}

export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    (err as NodeJS.ErrnoException).code === code
  );
}
