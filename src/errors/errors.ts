/**
 * Error taxonomy shared by every module.
 *
 * - ValidationError: malformed input from a caller; surfaced to the caller.
 * - NotFoundError: a referenced participant, schedule or job does not exist.
 * - TransientDependencyError: the store or a transport failed; the operation may be retried.
 * - InvariantViolation: internal consistency check failed (e.g. two pending jobs under one dedupe key).
 */

export type ErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'TRANSIENT_DEPENDENCY' | 'INVARIANT_VIOLATION';

export abstract class HabitLoopError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends HabitLoopError {
  readonly code = 'VALIDATION';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly hint?: string
  ) {
    super(field ? `${field}: ${message}` : message);
  }
}

export class NotFoundError extends HabitLoopError {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
  }
}

export class TransientDependencyError extends HabitLoopError {
  readonly code = 'TRANSIENT_DEPENDENCY';

  constructor(
    public readonly dependency: string,
    cause: unknown
  ) {
    super(`${dependency} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class InvariantViolation extends HabitLoopError {
  readonly code = 'INVARIANT_VIOLATION';
}

export function isHabitLoopError(error: unknown): error is HabitLoopError {
  return error instanceof HabitLoopError;
}
