/**
 * Registry Kernel — Purity Test
 *
 * Statically verifies that packages/kernel/src/ imports no side-effectful
 * Node.js module and nothing from the runtime host:
 *   - node:fs, node:fs/promises (filesystem I/O)
 *   - node:child_process (subprocess execution)
 *   - node:net, node:http, node:https (network)
 *   - @sciregistry/runtime-host (the layer that implements kernel interfaces)
 *
 * node:crypto is allowed: hashing is a pure computation.
 *
 * Approach: scan every .ts source file under packages/kernel/src/ for the
 * forbidden import patterns.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const kernelSrcDir = join(testDir, '..', 'src');

const FORBIDDEN_IMPORT_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'node:fs', pattern: /from ['"](node:)?fs['"]/ },
  { label: 'node:fs/promises', pattern: /from ['"](node:)?fs\/promises['"]/ },
  { label: 'node:child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'node:net', pattern: /from ['"](node:)?net['"]/ },
  { label: 'node:http', pattern: /from ['"](node:)?http['"]/ },
  { label: 'node:https', pattern: /from ['"](node:)?https['"]/ },
  { label: '@sciregistry/runtime-host', pattern: /from ['"]@sciregistry\/runtime-host['"]/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

describe('kernel purity: no side-effectful imports', () => {
  const sourceFiles = collectTsFiles(kernelSrcDir);

  it('finds kernel source files to scan', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_IMPORT_PATTERNS)('no kernel source file imports $label', ({ label, pattern }) => {
    const violations = sourceFiles
      .filter((file) => pattern.test(readFileSync(file, 'utf-8')))
      .map((file) => `  ${file.replace(kernelSrcDir + '/', '')} imports ${label}`);

    expect(violations, `kernel/src must not import '${label}':\n${violations.join('\n')}`).toHaveLength(0);
  });

  it('imports node:crypto somewhere, so the allowance is not vacuous', () => {
    const hasCrypto = sourceFiles.some((file) =>
      /from ['"]node:crypto['"]/.test(readFileSync(file, 'utf-8')),
    );
    expect(hasCrypto).toBe(true);
  });
});
