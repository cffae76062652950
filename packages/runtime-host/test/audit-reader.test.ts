/**
 * Registry Runtime Host — Audit Log Reader Tests
 *
 *   AR-1: valid records are parsed; blank lines are skipped
 *   AR-2: lines that are not JSON or fail the schema count as parse errors
 *   AR-3: duplicate event_ids are dropped, first occurrence wins
 *   AR-4: a partial trailing line is dropped and flagged
 *   AR-5: output is sorted by (timestamp, event_id)
 *   AR-6: filterAuditRecords matches every field set
 *
 * Pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { AuditOutcome } from '@sciregistry/kernel';
import { filterAuditRecords, readAuditLog } from '../src/logging/audit-reader.js';

function line(eventId: string, timestamp: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    event_id: eventId,
    timestamp,
    requester: 'uma',
    operation: 'read',
    dataset_id: 'ds-1',
    outcome: 'Permit',
    error_code: null,
    detail: null,
    ...extra,
  });
}

const T1 = '2026-03-01T12:00:01.000Z';
const T2 = '2026-03-01T12:00:02.000Z';
const T3 = '2026-03-01T12:00:03.000Z';

describe('readAuditLog — AR-1/AR-2', () => {
  it('parses one record per valid line', () => {
    const { records, stats } = readAuditLog([line('E1', T1), '', line('E2', T2)].join('\n') + '\n');

    expect(records.map((r) => r.event_id)).toEqual(['E1', 'E2']);
    expect(stats).toEqual({
      totalLines: 2,
      parsedRecords: 2,
      duplicates: 0,
      parseErrors: 0,
      partialTrailingLine: false,
    });
  });

  it('counts non-JSON lines and schema failures as parse errors', () => {
    const raw = [
      line('E1', T1),
      'not json',
      line('E2', T2, { operation: 'delete' }),
      line('E3', T3, { error_code: 'Teapot' }),
      JSON.stringify({ event_id: 'E4' }),
    ].join('\n') + '\n';

    const { records, stats } = readAuditLog(raw);

    expect(records.map((r) => r.event_id)).toEqual(['E1']);
    expect(stats.parseErrors).toBe(4);
    expect(stats.totalLines).toBe(5);
  });

  it('returns zero stats for empty input', () => {
    expect(readAuditLog('')).toEqual({
      records: [],
      stats: { totalLines: 0, parsedRecords: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    });
  });
});

describe('readAuditLog — AR-3/AR-4/AR-5', () => {
  it('keeps the first of duplicated event ids', () => {
    const raw = [
      line('E1', T1, { detail: 'first' }),
      line('E1', T1, { detail: 'second' }),
    ].join('\n') + '\n';

    const { records, stats } = readAuditLog(raw);

    expect(records.map((r) => r.detail)).toEqual(['first']);
    expect(stats.duplicates).toBe(1);
  });

  it('drops an unterminated last line', () => {
    const raw = line('E1', T1) + '\n' + line('E2', T2).slice(0, 20);

    const { records, stats } = readAuditLog(raw);

    expect(records.map((r) => r.event_id)).toEqual(['E1']);
    expect(stats.partialTrailingLine).toBe(true);
    expect(stats.parseErrors).toBe(0);
    expect(stats.totalLines).toBe(1);
  });

  it('sorts by timestamp, then event id', () => {
    const raw = [line('E9', T2), line('E5', T3), line('E2', T2), line('E7', T1)].join('\n') + '\n';
    expect(readAuditLog(raw).records.map((r) => r.event_id)).toEqual(['E7', 'E2', 'E9', 'E5']);
  });
});

describe('filterAuditRecords — AR-6', () => {
  const { records } = readAuditLog(
    [
      line('E1', T1),
      line('E2', T2, { requester: 'vera', outcome: 'Deny', error_code: 'Forbidden' }),
      line('E3', T3, { operation: 'invalidate', dataset_id: 'ds-2', outcome: 'Applied' }),
    ].join('\n') + '\n',
  );

  it('returns everything for an empty filter', () => {
    expect(filterAuditRecords(records, {})).toHaveLength(3);
  });

  it('combines the fields that are set', () => {
    expect(filterAuditRecords(records, { datasetId: 'ds-1' }).map((r) => r.event_id)).toEqual(['E1', 'E2']);
    expect(
      filterAuditRecords(records, { datasetId: 'ds-1', outcome: AuditOutcome.Deny }).map((r) => r.event_id),
    ).toEqual(['E2']);
    expect(filterAuditRecords(records, { requester: 'uma', operation: 'invalidate' }).map((r) => r.event_id)).toEqual([
      'E3',
    ]);
  });
});
