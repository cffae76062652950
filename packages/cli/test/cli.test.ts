/**
 * sciregistry CLI — End-to-end Command Tests
 *
 *   CLI-1: upload runs the whole lifecycle and show reports the result
 *   CLI-2: errors print `<code>: <message>` and exit 1
 *   CLI-3: grant, revoke and group membership control access
 *   CLI-4: --replaces links versions; chain prints them oldest first
 *   CLI-5: download and verify check stored bytes
 *   CLI-6: invalidate hides a dataset from list
 *   CLI-7: log reads the audit trail back
 *   CLI-8: hideForbidden reports refusals as NotFound
 *
 * Each test runs the program in-process against its own temporary home.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { digestBytes } from '@sciregistry/kernel';
import { readContainerDir } from '../src/container.js';
import { runCli, uploadedId, writeContainer } from './helpers.js';

let scratch: string;
let home: string;

beforeEach(() => {
  scratch = mkdtempSync(join(tmpdir(), 'sciregistry-cli-'));
  home = join(scratch, 'home');
});

afterEach(() => {
  rmSync(scratch, { recursive: true, force: true });
});

const asUma = (...args: string[]) => runCli(home, 'uma', args);
const asVera = (...args: string[]) => runCli(home, 'vera', args);

async function upload(name: string, files?: Record<string, string>, extra: string[] = []): Promise<string> {
  const dir = writeContainer(join(scratch, name), { files });
  return uploadedId(await asUma('upload', dir, ...extra));
}

// ---------------------------------------------------------------------------
// CLI-1
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-1: upload and show', () => {
  it('uploads every file of the container and completes the dataset', async () => {
    const dir = writeContainer(join(scratch, 'run-1'));
    const result = await asUma('upload', dir);

    expect(result.exitCode).toBe(0);
    const id = uploadedId(result);
    const { hash } = await readContainerDir(dir);
    expect(result.out[1]).toBe(`hash: ${hash}`);

    const shown = await asUma('show', id, '--json');
    const dataset: unknown = JSON.parse(shown.out.join('\n'));
    expect(dataset).toMatchObject({
      id,
      owner: 'uma',
      title: 'Calibration run',
      complete: true,
      invalidated: false,
      hash,
      replaces: null,
    });
    expect(dataset).toHaveProperty('content.length', 3);
  });

  it('renders a readable summary without --json', async () => {
    const id = await upload('run-1');
    const { out } = await asUma('show', id);
    const text = out.join('\n');

    expect(text).toContain('Calibration run  complete');
    expect(text).toContain('data/run.csv  8 B');
  });
});

// ---------------------------------------------------------------------------
// CLI-2
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-2: error reporting', () => {
  it('reports an unknown dataset', async () => {
    const result = await asUma('show', 'no-such-id');
    expect(result.exitCode).toBe(1);
    expect(result.err).toEqual(['NotFound: Dataset no-such-id not found']);
  });

  it('reports a container without meta.json', async () => {
    const dir = writeContainer(join(scratch, 'broken'));
    rmSync(join(dir, 'meta.json'));

    const result = await asUma('upload', dir);
    expect(result.exitCode).toBe(1);
    expect(result.err).toEqual([`ValidationError: meta.json: meta.json is missing from ${dir}`]);
  });

  it('reports invalid container metadata before creating anything', async () => {
    const dir = writeContainer(join(scratch, 'bad-meta'), {
      meta: { author: 'Uma Uploader', email: 'not-an-address', title: 'Bad' },
    });

    const result = await asUma('upload', dir);
    expect(result.err).toEqual(['ValidationError: meta.email: Invalid email']);
    expect((await asUma('list')).out).toEqual(['(no datasets)']);
  });
});

// ---------------------------------------------------------------------------
// CLI-3
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-3: access control', () => {
  it('refuses a non-owner until read is granted, and again after revoke', async () => {
    const id = await upload('run-1');

    expect((await asVera('show', id)).err).toEqual([`Forbidden: vera may not read dataset ${id}`]);

    const granted = await asUma('grant', id, 'user:vera', 'read');
    expect(granted.exitCode).toBe(0);
    expect(granted.out.join('\n')).toContain('read          user:vera');
    expect((await asVera('show', id, '--json')).exitCode).toBe(0);

    await asUma('revoke', id, 'vera', 'read');
    expect((await asVera('show', id)).exitCode).toBe(1);
  });

  it('grants through group membership', async () => {
    const id = await upload('run-1');
    await asUma('group', 'add', 'lab', 'vera');
    await asUma('grant', id, 'group:lab', 'read');

    expect((await asVera('show', id, '--json')).exitCode).toBe(0);
    expect((await asUma('group', 'list')).out).toEqual(['lab  vera']);

    await asUma('group', 'remove', 'lab', 'vera');
    expect((await asVera('show', id)).exitCode).toBe(1);
  });

  it('rejects malformed principals and operations', async () => {
    const id = await upload('run-1');
    const result = await asUma('grant', id, 'team:lab', 'read', 'delete');

    expect(result.err).toEqual([
      'ValidationError: principal: expected user:<name> or group:<name>, got "team:lab"; ' +
        'operation.1: expected read or write, got "delete"',
    ]);
  });

  it('lets only the owner change permissions', async () => {
    const id = await upload('run-1');
    await asUma('grant', id, 'user:vera', 'read', 'write');

    const result = await asVera('grant', id, 'user:walt', 'read');
    expect(result.err).toEqual([`Forbidden: Only the owner may change permissions of ${id}`]);
  });
});

// ---------------------------------------------------------------------------
// CLI-4
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-4: versions', () => {
  it('links a replacement and refuses a second one', async () => {
    const first = await upload('v1');
    const second = await upload('v2', { 'data/run.csv': 'x,y\n1,3\n' }, ['--replaces', first]);

    expect(JSON.parse((await asUma('chain', second, '--json')).out.join(''))).toEqual([first, second]);

    const third = await asUma('upload', writeContainer(join(scratch, 'v3')), '--replaces', first);
    expect(third.exitCode).toBe(1);
    expect(third.err).toEqual([`ChainConflict: Dataset ${first} is already replaced by ${second}`]);
  });
});

// ---------------------------------------------------------------------------
// CLI-5
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-5: download and verify', () => {
  it('writes a downloaded file to -o', async () => {
    const id = await upload('run-1', { 'data/run.csv': 'x,y\n4,5\n' });
    const target = join(scratch, 'out.csv');

    const result = await asUma('download', id, 'data/run.csv', '-o', target);

    expect(result.exitCode).toBe(0);
    expect(readFileSync(target, 'utf-8')).toBe('x,y\n4,5\n');
  });

  it('reports an intact dataset', async () => {
    const dir = writeContainer(join(scratch, 'run-1'));
    const id = uploadedId(await asUma('upload', dir));
    const { hash } = await readContainerDir(dir);

    expect((await asUma('verify', id)).out).toEqual([`intact  ${hash}`]);
  });

  it('fails verification when stored bytes change', async () => {
    const id = await upload('run-1', { 'data/run.csv': 'original' });
    const ref = digestBytes(new TextEncoder().encode('original'));
    writeFileSync(join(home, 'content', ref.slice(0, 2), ref.slice(2)), 'tampered', 'utf-8');

    const result = await asUma('verify', id);
    expect(result.exitCode).toBe(1);
    expect(result.out[0]).toBe('integrity check failed');
  });
});

// ---------------------------------------------------------------------------
// CLI-6
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-6: invalidate', () => {
  it('hides an invalidated dataset from list but keeps show working', async () => {
    const id = await upload('run-1');
    expect((await asUma('list')).out).toHaveLength(1);

    expect((await asUma('invalidate', id, '--yes')).out).toEqual([`Invalidated ${id}`]);

    expect((await asUma('list')).out).toEqual(['(no datasets)']);
    expect((await asUma('show', id)).out.join('\n')).toContain('invalidated');
  });
});

// ---------------------------------------------------------------------------
// CLI-7
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-7: audit log', () => {
  it('filters records by dataset, operation and outcome', async () => {
    const id = await upload('run-1');
    await asVera('show', id);

    const completions = JSON.parse((await asUma('log', '--dataset', id, '--operation', 'completeUpload', '--json')).out.join('\n'));
    expect(completions).toHaveLength(2);

    const denials = await asUma('log', '--outcome', 'deny', '--json');
    expect(JSON.parse(denials.out.join('\n'))).toMatchObject([
      { requester: 'vera', operation: 'read', dataset_id: id, outcome: 'Deny', error_code: 'Forbidden' },
    ]);
  });

  it('limits output to the most recent records', async () => {
    await upload('run-1');
    const { out } = await asUma('log', '--limit', '2');
    expect(out).toHaveLength(2);
  });

  it('rejects an unknown outcome', async () => {
    const result = await asUma('log', '--outcome', 'maybe');
    expect(result.err).toEqual([
      'ValidationError: outcome: expected one of Permit, Deny, Applied, Failed, got "maybe"',
    ]);
  });
});

// ---------------------------------------------------------------------------
// CLI-8
// ---------------------------------------------------------------------------

describe('sciregistry CLI — CLI-8: hideForbidden', () => {
  it('makes a refused dataset indistinguishable from an unknown one', async () => {
    const id = await upload('run-1');
    writeFileSync(join(home, 'config.json'), JSON.stringify({ hideForbidden: true }), 'utf-8');

    expect((await asVera('show', id)).err).toEqual([`NotFound: Dataset ${id} not found`]);
    expect((await asVera('show', 'no-such-id')).err).toEqual(['NotFound: Dataset no-such-id not found']);
  });
});
