/**
 * Registry Runtime Host — File-backed Audit Sink
 *
 * Implements the AuditSink interface from @sciregistry/kernel by appending
 * one JSONL line per event to `<home>/logs/audit.jsonl`.
 *
 * The kernel owns the AuditSink interface and AuditLogger class. This is the
 * only place in the system that writes audit entries to disk.
 *
 * Synchronous: the line is written before the call returns, so an event is
 * durable before the registry reports the outcome it describes.
 */

import type { AuditEvent, AuditSink } from '@sciregistry/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const AUDIT_LOG_FILE = 'audit.jsonl';

export class FileAuditSink implements AuditSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(event: AuditEvent): void {
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: event.timestamp,
      requester: event.requester,
      operation: event.operation,
      dataset_id: event.dataset_id,
      outcome: event.outcome,
      error_code: event.error_code,
      detail: event.detail,
    });
    this.stateIO.appendLine(AUDIT_LOG_FILE, line);
  }
}
