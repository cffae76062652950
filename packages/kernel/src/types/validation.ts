/**
 * Registry Kernel — Validation Result
 *
 * Validators return a discriminated union instead of throwing, so that every
 * problem can be reported at once. Callers that need an exception convert a
 * failed result with `new ValidationError(result.errors)`.
 */

import type { ValidationProblem } from '../errors.js';

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationProblem> };
