/**
 * Shared fixtures for CLI tests: container directories on disk and an
 * in-process runner that captures console output.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import { vi } from 'vitest';
import { createProgram } from '../src/commands/index.js';

export interface ContainerFixture {
  readonly content?: Record<string, unknown> | undefined;
  readonly meta?: Record<string, unknown> | undefined;
  /** Relative POSIX name → text. */
  readonly files?: Readonly<Record<string, string>> | undefined;
}

export function writeContainer(dir: string, fixture: ContainerFixture = {}): string {
  mkdirSync(dir, { recursive: true });
  const content = fixture.content ?? {
    modelVersion: '0.5.1',
    containerType: { name: 'TestContainer', version: '1.0' },
    created: '2026-01-05T10:00:00Z',
    modified: '2026-01-05T10:00:00Z',
    static: true,
    complete: true,
  };
  const meta = fixture.meta ?? { author: 'Uma Uploader', email: 'uma@example.org', title: 'Calibration run' };
  writeFileSync(join(dir, 'content.json'), JSON.stringify(content), 'utf-8');
  writeFileSync(join(dir, 'meta.json'), JSON.stringify(meta), 'utf-8');
  for (const [name, text] of Object.entries(fixture.files ?? { 'data/run.csv': 'x,y\n1,2\n' })) {
    const target = join(dir, ...name.split('/'));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, text, 'utf-8');
  }
  return dir;
}

export interface RunResult {
  readonly out: ReadonlyArray<string>;
  readonly err: ReadonlyArray<string>;
  readonly exitCode: number;
}

/**
 * Run one CLI invocation against `home` as `as`, capturing console output
 * with ANSI colors removed. Resets process.exitCode afterwards.
 */
export async function runCli(home: string, as: string, args: ReadonlyArray<string>): Promise<RunResult> {
  const out: string[] = [];
  const err: string[] = [];
  const capture = (into: string[]) => (...parts: unknown[]): void => {
    into.push(stripVTControlCharacters(parts.map(String).join(' ')));
  };
  const log = vi.spyOn(console, 'log').mockImplementation(capture(out));
  const error = vi.spyOn(console, 'error').mockImplementation(capture(err));

  process.exitCode = 0;
  try {
    await createProgram()
      .exitOverride()
      .parseAsync(['--home', home, '--as', as, ...args], { from: 'user' });
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
  const exitCode = Number(process.exitCode ?? 0);
  process.exitCode = 0;
  return { out, err, exitCode };
}

/** The dataset id from `upload` output. */
export function uploadedId(result: RunResult): string {
  const match = /^Uploaded (\S+)/.exec(result.out[0] ?? '');
  if (match?.[1] === undefined) {
    throw new Error(`no upload id in ${JSON.stringify(result)}`);
  }
  return match[1];
}
