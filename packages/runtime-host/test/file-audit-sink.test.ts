/**
 * Registry Runtime Host — FileAuditSink Tests
 *
 *   AS-1: each event becomes one JSONL line with an event_id
 *   AS-2: what the sink writes, the reader reads back unchanged
 */

import { describe, it, expect } from 'vitest';
import { AuditLogger, AuditOutcome } from '@sciregistry/kernel';
import type { AuditEvent } from '@sciregistry/kernel';
import { AUDIT_LOG_FILE, FileAuditSink } from '../src/logging/file-audit-sink.js';
import { readAuditLog } from '../src/logging/audit-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const EVENT: AuditEvent = {
  timestamp: '2026-03-01T12:00:00.000Z',
  requester: 'vera',
  operation: 'download',
  dataset_id: 'ds-1',
  outcome: AuditOutcome.Deny,
  error_code: 'Forbidden',
  detail: 'vera may not read dataset ds-1',
};

function counter(): () => string {
  let n = 0;
  return () => `EVT${String(++n).padStart(6, '0')}`;
}

describe('FileAuditSink — AS-1', () => {
  it('appends one line per event with fields in a fixed order', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileAuditSink(stateIO, counter());

    sink.append(EVENT);

    expect(stateIO.readLines(AUDIT_LOG_FILE)).toEqual([
      '{"event_id":"EVT000001","timestamp":"2026-03-01T12:00:00.000Z","requester":"vera",' +
        '"operation":"download","dataset_id":"ds-1","outcome":"Deny","error_code":"Forbidden",' +
        '"detail":"vera may not read dataset ds-1"}',
    ]);
  });

  it('assigns a ULID by default', () => {
    const stateIO = new MemoryStateIO();
    new FileAuditSink(stateIO).append(EVENT);

    const [written] = stateIO.readLines(AUDIT_LOG_FILE);
    const parsed: unknown = JSON.parse(written ?? '{}');
    expect(parsed).toMatchObject({ event_id: expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/) });
  });
});

describe('FileAuditSink — AS-2', () => {
  it('round-trips through the audit logger and reader', () => {
    const stateIO = new MemoryStateIO();
    const logger = new AuditLogger(new FileAuditSink(stateIO, counter()), () => '2026-03-01T12:00:00.000Z');

    logger.permit({ requester: 'uma', operation: 'listVisible', datasetId: null });
    logger.applied({ requester: 'uma', operation: 'invalidate', datasetId: 'ds-1' }, 'invalidated');

    const { records, stats } = readAuditLog(stateIO.readLogRaw(AUDIT_LOG_FILE));
    expect(stats.parseErrors).toBe(0);
    expect(records).toEqual([
      {
        event_id: 'EVT000001',
        timestamp: '2026-03-01T12:00:00.000Z',
        requester: 'uma',
        operation: 'listVisible',
        dataset_id: null,
        outcome: 'Permit',
        error_code: null,
        detail: null,
      },
      {
        event_id: 'EVT000002',
        timestamp: '2026-03-01T12:00:00.000Z',
        requester: 'uma',
        operation: 'invalidate',
        dataset_id: 'ds-1',
        outcome: 'Applied',
        error_code: null,
        detail: 'invalidated',
      },
    ]);
  });
});
