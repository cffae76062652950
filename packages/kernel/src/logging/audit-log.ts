/**
 * Registry Kernel — Audit Logger
 *
 * Builds complete AuditEvents and forwards them to the injected sink.
 * Without a sink (tests, embedded use) recording is a no-op.
 */

import type { RegistryErrorCode } from '../errors.js';
import { isRegistryError } from '../errors.js';
import type { AuditEvent, RegistryOperation } from '../types/audit.js';
import { AuditOutcome } from '../types/audit.js';
import type { AuditSink } from './audit-sink.js';

export interface AuditSubject {
  readonly requester: string;
  readonly operation: RegistryOperation;
  readonly datasetId: string | null;
}

export class AuditLogger {
  constructor(
    private readonly sink?: AuditSink,
    private readonly clock: () => string = () => new Date().toISOString(),
  ) {}

  permit(subject: AuditSubject, detail: string | null = null): void {
    this.record(subject, AuditOutcome.Permit, null, detail);
  }

  deny(subject: AuditSubject, code: RegistryErrorCode, detail: string | null = null): void {
    this.record(subject, AuditOutcome.Deny, code, detail);
  }

  applied(subject: AuditSubject, detail: string | null = null): void {
    this.record(subject, AuditOutcome.Applied, null, detail);
  }

  /**
   * Record a permitted request that failed. Errors that are not
   * RegistryErrors are recorded without a code and their message as detail.
   */
  failed(subject: AuditSubject, err: unknown): void {
    const code = isRegistryError(err) ? err.code : null;
    const detail = err instanceof Error ? err.message : String(err);
    this.record(subject, AuditOutcome.Failed, code, detail);
  }

  private record(
    subject: AuditSubject,
    outcome: AuditOutcome,
    code: RegistryErrorCode | null,
    detail: string | null,
  ): void {
    const event: AuditEvent = {
      timestamp: this.clock(),
      requester: subject.requester,
      operation: subject.operation,
      dataset_id: subject.datasetId,
      outcome,
      error_code: code,
      detail,
    };
    this.sink?.append(event);
  }
}
