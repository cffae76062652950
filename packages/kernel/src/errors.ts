/**
 * Registry Kernel — Error Taxonomy
 *
 * Every failure the registry reports is a RegistryError carrying a stable
 * `code`. Callers switch on the code (or use instanceof on the subclasses);
 * messages are for operators and may change.
 *
 *   NotFound        unknown dataset or manifest entry
 *   Forbidden       permission check failed
 *   ImmutableError  mutation of a completed or invalidated dataset
 *   IntegrityError  payload hash mismatch or corrupted stored bytes
 *   ChainConflict   version-link invariant violated
 *   ValidationError malformed or incomplete input
 *   StorageError    the Content Store failed (not retried by the registry)
 *   Cancelled       the caller aborted the operation before it applied
 *
 * Forbidden and NotFound are distinct here. Collapsing them for information
 * hiding is a presentation-layer decision.
 */

export const REGISTRY_ERROR_CODES = [
  'NotFound',
  'Forbidden',
  'ImmutableError',
  'IntegrityError',
  'ChainConflict',
  'ValidationError',
  'StorageError',
  'Cancelled',
] as const;

export type RegistryErrorCode = (typeof REGISTRY_ERROR_CODES)[number];

export class RegistryError extends Error {
  constructor(
    readonly code: RegistryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RegistryError';
  }
}

export function isRegistryError(x: unknown): x is RegistryError {
  return x instanceof RegistryError;
}

export class NotFoundError extends RegistryError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends RegistryError {
  constructor(message: string) {
    super('Forbidden', message);
    this.name = 'ForbiddenError';
  }
}

export class ImmutableError extends RegistryError {
  constructor(message: string) {
    super('ImmutableError', message);
    this.name = 'ImmutableError';
  }
}

export class ChainConflictError extends RegistryError {
  constructor(message: string) {
    super('ChainConflict', message);
    this.name = 'ChainConflictError';
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** One problem found while validating input. `path` is dotted, e.g. `meta.email`. */
export interface ValidationProblem {
  readonly path: string;
  readonly message: string;
}

export class ValidationError extends RegistryError {
  readonly problems: ReadonlyArray<ValidationProblem>;

  constructor(problems: ReadonlyArray<ValidationProblem>) {
    super('ValidationError', problems.map(formatProblem).join('; '));
    this.name = 'ValidationError';
    this.problems = problems;
  }

  static single(path: string, message: string): ValidationError {
    return new ValidationError([{ path, message }]);
  }
}

function formatProblem(p: ValidationProblem): string {
  return p.path === '' ? p.message : `${p.path}: ${p.message}`;
}

// ---------------------------------------------------------------------------
// Integrity
// ---------------------------------------------------------------------------

export type IntegrityFailureReason = 'missing' | 'size_mismatch' | 'digest_mismatch';

/** A manifest entry whose stored bytes do not match what was recorded at append time. */
export interface IntegrityFailure {
  readonly name: string;
  readonly reason: IntegrityFailureReason;
  readonly expected: string;
  readonly actual: string | null;
}

export class IntegrityError extends RegistryError {
  readonly expected: string;
  readonly computed: string;
  readonly failures: ReadonlyArray<IntegrityFailure>;

  constructor(
    subject: string,
    expected: string,
    computed: string,
    failures: ReadonlyArray<IntegrityFailure>,
  ) {
    const detail = failures
      .map((f) => `${f.name} (${f.reason}: expected ${f.expected}, got ${f.actual ?? 'nothing'})`)
      .join(', ');
    super(
      'IntegrityError',
      `Integrity check failed for ${subject}: expected ${expected}, computed ${computed}` +
        (detail === '' ? '' : `; failing entries: ${detail}`),
    );
    this.name = 'IntegrityError';
    this.expected = expected;
    this.computed = computed;
    this.failures = failures;
  }
}

// ---------------------------------------------------------------------------
// Collaborator failures
// ---------------------------------------------------------------------------

export class StorageError extends RegistryError {
  constructor(message: string, cause: unknown) {
    super('StorageError', `${message}: ${describeCause(cause)}`, { cause });
    this.name = 'StorageError';
  }
}

export class CancelledError extends RegistryError {
  constructor(operation: string) {
    super('Cancelled', `${operation} was cancelled before it was applied`);
    this.name = 'CancelledError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
