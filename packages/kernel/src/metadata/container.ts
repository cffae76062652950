/**
 * Registry Kernel — Container Metadata Validation
 *
 * Validates the `content.json` and `meta.json` documents of a scientific data
 * container and normalizes them into DatasetMetadata.
 *
 * The rules depend on the container's declared `modelVersion`:
 *
 *   0.3    content: containerType, created, modified, static, complete,
 *                   modelVersion (required); uuid, replaces, hash,
 *                   usedSoftware (optional)
 *          meta:    author, email, title (required); comment, description,
 *                   keywords, organization (optional)
 *   0.5.1  meta additionally accepts timestamp, doi, license
 *
 * The newest rule set whose version is ≤ the declared version applies.
 * Model versions below 0.3 are refused.
 *
 * Empty values (null, "", []) are treated as absent before validation, so an
 * empty required field is reported as missing.
 */

import { z } from 'zod';
import type { ValidationProblem } from '../errors.js';
import type { ContainerDocuments, DatasetMetadata } from '../types/dataset.js';
import type { ValidationResult } from '../types/validation.js';

// ---------------------------------------------------------------------------
// Model versions
// ---------------------------------------------------------------------------

export const MIN_MODEL_VERSION = '0.3';

/** Rule sets, newest first. */
const RULE_SET_VERSIONS = ['0.5.1', '0.3'] as const;
type RuleSetVersion = (typeof RULE_SET_VERSIONS)[number];

/** Parse `1`, `0.5`, `0.5.1` into numeric parts. Null if not dotted digits. */
export function parseModelVersion(version: string): ReadonlyArray<number> | null {
  if (!/^\d+(\.\d+)*$/.test(version.trim())) return null;
  return version.trim().split('.').map(Number);
}

/** Numeric, part-by-part comparison; missing parts count as zero. */
export function compareModelVersions(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

function selectRuleSet(declared: ReadonlyArray<number>): RuleSetVersion | null {
  for (const candidate of RULE_SET_VERSIONS) {
    const parts = parseModelVersion(candidate);
    if (parts !== null && compareModelVersions(parts, declared) <= 0) {
      return candidate;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const SPACED_UTC = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}) (UTC|GMT)$/;
const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * ISO 8601 timestamps (calendar date, optionally a time and an offset), plus
 * the `YYYY-MM-DD hh:mm:ss UTC` form older containers carry. Normalized to
 * `Date.toISOString()`.
 */
const timestamp = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  const spaced = SPACED_UTC.exec(trimmed);
  const iso = ISO_8601.exec(trimmed);
  let candidate: string | null = null;
  if (spaced !== null) {
    candidate = `${spaced[1]}T${spaced[2]}Z`;
  } else if (iso !== null) {
    const offset = (iso[3] ?? '').replace(/^([+-]\d{2})(\d{2})$/, '$1:$2');
    candidate = iso[2] === undefined ? `${iso[1]}` : `${iso[1]}T${iso[2]}${offset}`;
  }
  const ms = candidate === null ? Number.NaN : Date.parse(candidate);
  if (Number.isNaN(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a valid timestamp: "${value}"` });
    return z.NEVER;
  }
  return new Date(ms).toISOString();
});

const reference = z.object({
  name: z.string().min(1),
  version: z.string().optional(),
  id: z.string().optional(),
});

const ContentSchema = z.object({
  uuid: z.string().optional(),
  replaces: z.string().optional(),
  containerType: reference,
  created: timestamp,
  modified: timestamp,
  static: z.boolean(),
  complete: z.boolean(),
  hash: z.string().optional(),
  usedSoftware: z.array(reference).optional(),
  modelVersion: z.string(),
});

const MetaSchema = z.object({
  author: z.string().min(1),
  email: z.string().email(),
  title: z.string().min(1),
  comment: z.string().optional(),
  description: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  organization: z.string().optional(),
  // 0.5.1
  timestamp: z.string().optional(),
  doi: z.string().optional(),
  license: z.string().optional(),
});

const META_FIELDS_SINCE_0_5_1 = ['timestamp', 'doi', 'license'] as const;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function dropEmpty(doc: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (value === null || value === undefined || value === '') continue;
    if (Array.isArray(value) && value.length === 0) continue;
    out[key] = value;
  }
  return out;
}

function toProblems(file: string, error: z.ZodError): ValidationProblem[] {
  return error.issues.map((issue) => ({
    path: [file, ...issue.path.map(String)].join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a container's documents and normalize them.
 *
 * Reports every problem found in both documents, not just the first.
 */
export function validateContainerMetadata(docs: ContainerDocuments): ValidationResult<DatasetMetadata> {
  if (!isPlainObject(docs.content)) {
    return { ok: false, errors: [{ path: 'content', message: 'content.json must be a JSON object' }] };
  }
  if (!isPlainObject(docs.meta)) {
    return { ok: false, errors: [{ path: 'meta', message: 'meta.json must be a JSON object' }] };
  }
  const content = dropEmpty(docs.content);
  const meta = dropEmpty(docs.meta);

  const rawVersion = content['modelVersion'];
  if (typeof rawVersion !== 'string') {
    return { ok: false, errors: [{ path: 'content.modelVersion', message: 'Required' }] };
  }
  const declared = parseModelVersion(rawVersion);
  if (declared === null) {
    return {
      ok: false,
      errors: [{ path: 'content.modelVersion', message: `not a version number: "${rawVersion}"` }],
    };
  }
  const ruleSet = selectRuleSet(declared);
  if (ruleSet === null) {
    return {
      ok: false,
      errors: [{
        path: 'content.modelVersion',
        message: `model version ${rawVersion} is not supported; the minimum is ${MIN_MODEL_VERSION}`,
      }],
    };
  }

  if (ruleSet === '0.3') {
    for (const field of META_FIELDS_SINCE_0_5_1) {
      delete meta[field];
    }
  }

  const contentResult = ContentSchema.safeParse(content);
  const metaResult = MetaSchema.safeParse(meta);
  const errors: ValidationProblem[] = [
    ...(contentResult.success ? [] : toProblems('content', contentResult.error)),
    ...(metaResult.success ? [] : toProblems('meta', metaResult.error)),
  ];
  if (!contentResult.success || !metaResult.success) {
    return { ok: false, errors };
  }

  const c = contentResult.data;
  const m = metaResult.data;
  return {
    ok: true,
    value: {
      title: m.title,
      author: m.author,
      email: m.email,
      organization: m.organization,
      comment: m.comment,
      description: m.description,
      license: m.license,
      doi: m.doi,
      timestamp: m.timestamp,
      keywords: m.keywords ?? [],
      used_software: c.usedSoftware ?? [],
      static: c.static,
      model_version: c.modelVersion,
      container_type: c.containerType,
      created: c.created,
      modified: c.modified,
      container_uuid: c.uuid,
      replaces: c.replaces,
    },
  };
}
