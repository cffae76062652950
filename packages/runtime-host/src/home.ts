/**
 * Registry Runtime Host — Home and Configuration
 *
 * The registry home holds everything a registry instance persists:
 *
 *   <home>/
 *     config.json      optional operator configuration
 *     state/           datasets.json, permissions.json, chain.json, groups.json
 *     logs/            audit.jsonl
 *     content/         file payloads, content-addressed
 *
 * Home resolution precedence:
 *   1. Explicit `home` option (the CLI's --home flag)
 *   2. SCIREG_HOME environment variable
 *   3. Default: ~/.sciregistry
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '@sciregistry/kernel';
import { FileStateIO, isNodeError } from './state/state-io.js';

// ---------------------------------------------------------------------------
// Home resolution
// ---------------------------------------------------------------------------

export interface ResolveRegistryHomeOptions {
  readonly home?: string | undefined;
}

/**
 * Resolve the registry home directory and create it if it does not exist.
 *
 * @returns Absolute path of the home directory
 */
export function resolveRegistryHome(opts?: ResolveRegistryHomeOptions): string {
  let home: string;
  if (typeof opts?.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (
    typeof process.env['SCIREG_HOME'] === 'string' &&
    process.env['SCIREG_HOME'] !== ''
  ) {
    home = process.env['SCIREG_HOME'];
  } else {
    home = join(homedir(), '.sciregistry');
  }

  const absolute = resolve(home);
  if (!existsSync(absolute)) {
    mkdirSync(absolute, { recursive: true });
  }
  return absolute;
}

export function homeStateIO(home: string): FileStateIO {
  return new FileStateIO(home);
}

export function contentDir(home: string): string {
  return join(home, 'content');
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

const RegistryConfigSchema = z
  .object({
    /** `.json` entries up to this size get a parsed inline preview. 0 disables previews. */
    previewMaxBytes: z.number().int().nonnegative().default(64 * 1024),
    /** Report Forbidden as NotFound to callers. */
    hideForbidden: z.boolean().default(false),
  })
  .strict();

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

export const DEFAULT_REGISTRY_CONFIG: RegistryConfig = RegistryConfigSchema.parse({});

/**
 * Parse a configuration object. Missing keys take their defaults.
 *
 * @throws {ValidationError} On unknown keys or wrongly typed values
 */
export function parseRegistryConfig(raw: unknown): RegistryConfig {
  const result = RegistryConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: ['config', ...issue.path.map(String)].join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/**
 * Load `<home>/config.json`. An absent file yields the defaults.
 *
 * @throws {ValidationError} If the file is not valid JSON or fails the schema
 */
export function loadRegistryConfig(home: string): RegistryConfig {
  const configPath = join(home, 'config.json');
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) {
      return DEFAULT_REGISTRY_CONFIG;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw ValidationError.single('config', `${configPath} is not valid JSON: ${reason}`);
  }
  return parseRegistryConfig(parsed);
}
