/**
 * Dataset Registry — Manifest Entry Helpers
 *
 * Entry-name rules and inline preview extraction for appendFile.
 */

import type { JsonValue, ValidationProblem } from '@sciregistry/kernel';

/**
 * Problems with a manifest entry name.
 *
 * Names are relative POSIX paths inside the container: no leading slash, no
 * backslash or NUL, and no empty, `.` or `..` segment.
 */
export function entryNameProblems(name: string, path = 'file.name'): ValidationProblem[] {
  if (name === '') {
    return [{ path, message: 'name must not be empty' }];
  }
  const problems: ValidationProblem[] = [];
  if (name.startsWith('/')) {
    problems.push({ path, message: `${name} must be a relative path` });
  }
  if (name.includes('\\') || name.includes('\0')) {
    problems.push({ path, message: `${name} contains a backslash or NUL character` });
  }
  const segments = name.replace(/^\/+/, '').split('/');
  if (segments.some((s) => s === '' || s === '.' || s === '..')) {
    problems.push({ path, message: `${name} has an empty, "." or ".." segment` });
  }
  return problems;
}

/**
 * Parsed inline preview for a `.json` entry, or undefined when the entry is
 * not JSON, exceeds `maxBytes`, or does not parse.
 */
export function jsonPreview(name: string, data: Uint8Array, maxBytes: number): JsonValue | undefined {
  if (!name.toLowerCase().endsWith('.json') || data.byteLength > maxBytes) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(data));
  } catch {
    return undefined;
  }
  return isJsonValue(parsed) ? parsed : undefined;
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}
