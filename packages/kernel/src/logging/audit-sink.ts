/**
 * Registry Kernel — Audit Sink Interface
 *
 * The injection point for audit persistence. The kernel owns this contract
 * and the AuditLogger; the runtime host supplies the implementation
 * (FileAuditSink). The kernel never writes to disk itself.
 */

import type { AuditEvent } from '../types/audit.js';

/**
 * Receives and persists audit events.
 *
 * append() is synchronous: the event must be durable when the call returns.
 * Implementations must not discard events; a sink that cannot write throws.
 */
export interface AuditSink {
  append(event: AuditEvent): void;
}
