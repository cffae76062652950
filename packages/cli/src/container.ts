/**
 * container.ts — Read an unpacked data container from disk
 *
 * A container directory holds `content.json` and `meta.json` at its root
 * plus any number of data files in subdirectories. Every regular file,
 * the two documents included, becomes one manifest entry named by its
 * POSIX path relative to the container root.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { ValidationError, compareNames, digestPayload } from '@sciregistry/kernel';
import type { ContainerDocuments, InlineFileInput } from '@sciregistry/kernel';
import { isNodeError } from '@sciregistry/runtime-host';

export interface ContainerDirectory {
  readonly documents: ContainerDocuments;
  /** In name order. */
  readonly files: ReadonlyArray<InlineFileInput>;
  /** Payload digest of `files`, the hash claimed at completion. */
  readonly hash: string;
}

async function listFiles(root: string, dir: string = root): Promise<string[]> {
  const names: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      names.push(...(await listFiles(root, full)));
    } else if (entry.isFile()) {
      names.push(relative(root, full).split(sep).join('/'));
    }
  }
  return names;
}

async function readDocument(root: string, name: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(join(root, name), 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      throw ValidationError.single(name, `${name} is missing from ${root}`);
    }
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw ValidationError.single(name, `${name} is not valid JSON: ${reason}`);
  }
}

/**
 * @throws {ValidationError} If content.json or meta.json is missing or not JSON
 */
export async function readContainerDir(root: string): Promise<ContainerDirectory> {
  const documents: ContainerDocuments = {
    content: await readDocument(root, 'content.json'),
    meta: await readDocument(root, 'meta.json'),
  };

  const files: InlineFileInput[] = [];
  for (const name of (await listFiles(root)).sort(compareNames)) {
    files.push({ name, data: await readFile(join(root, ...name.split('/'))) });
  }
  return { documents, files, hash: digestPayload(files) };
}
