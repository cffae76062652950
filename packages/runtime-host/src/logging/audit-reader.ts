/**
 * Registry Runtime Host — Audit Log Reader
 *
 * Pure function for reading audit.jsonl with dedupe-on-read. Accepts raw
 * JSONL text and returns validated records plus collection statistics.
 *
 * Guarantees:
 *   - lines that are not JSON or do not match the audit record schema are
 *     dropped and counted in parseErrors
 *   - records are deduplicated by event_id; the first occurrence wins
 *   - content not ending in '\n' has its last line dropped and flagged as a
 *     partial trailing line (a write interrupted mid-line)
 *   - output is sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain the raw text via StateIO.readLogRaw().
 */

import { z } from 'zod';
import { AuditOutcome, REGISTRY_ERROR_CODES, REGISTRY_OPERATIONS } from '@sciregistry/kernel';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const AuditRecordSchema = z.object({
  event_id: z.string().min(1),
  timestamp: z.string(),
  requester: z.string(),
  operation: z.enum(REGISTRY_OPERATIONS),
  dataset_id: z.string().nullable(),
  outcome: z.nativeEnum(AuditOutcome),
  error_code: z.enum(REGISTRY_ERROR_CODES).nullable(),
  detail: z.string().nullable(),
});

/** An AuditEvent as persisted, with its deduplication key. */
export type AuditRecord = z.infer<typeof AuditRecordSchema>;

export interface AuditReadStats {
  /** Non-empty lines processed, excluding a dropped partial trailing line. */
  totalLines: number;
  /** Records included in the output (after dedupe). */
  parsedRecords: number;
  duplicates: number;
  parseErrors: number;
  partialTrailingLine: boolean;
}

export interface AuditReadResult {
  records: ReadonlyArray<AuditRecord>;
  stats: AuditReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readAuditLog(rawContent: string): AuditReadResult {
  if (rawContent.length === 0) {
    return {
      records: [],
      stats: {
        totalLines: 0,
        parsedRecords: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const records: AuditRecord[] = [];

  for (const line of lines) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const result = AuditRecordSchema.safeParse(parsed);
    if (!result.success) {
      parseErrors++;
      continue;
    }

    const record = result.data;
    if (seen.has(record.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(record.event_id);
    records.push(record);
  }

  records.sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    if (a.event_id < b.event_id) return -1;
    if (a.event_id > b.event_id) return 1;
    return 0;
  });

  return {
    records,
    stats: {
      totalLines: lines.length,
      parsedRecords: records.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

export interface AuditFilter {
  readonly datasetId?: string | undefined;
  readonly requester?: string | undefined;
  readonly operation?: string | undefined;
  readonly outcome?: AuditOutcome | undefined;
}

/** Keep the records matching every field set in `filter`. */
export function filterAuditRecords(
  records: ReadonlyArray<AuditRecord>,
  filter: AuditFilter,
): AuditRecord[] {
  return records.filter(
    (r) =>
      (filter.datasetId === undefined || r.dataset_id === filter.datasetId) &&
      (filter.requester === undefined || r.requester === filter.requester) &&
      (filter.operation === undefined || r.operation === filter.operation) &&
      (filter.outcome === undefined || r.outcome === filter.outcome),
  );
}
