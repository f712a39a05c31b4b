export class TaskMirrorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, 429 or 5xx. Safe to retry. */
export class TransientExternalError extends TaskMirrorError {}

/** The external resource no longer exists. Callers treat this as a deletion. */
export class NotFoundExternalError extends TaskMirrorError {}

/** Any other external failure (bad request, revoked permissions). Not retried. */
export class PermanentExternalError extends TaskMirrorError {}

/** Rejected recurrence descriptor or task input. */
export class ValidationError extends TaskMirrorError {}

/** A second instance was written for an occupied (pattern, due_at) slot. */
export class ConstraintViolation extends TaskMirrorError {}

/** Another worker holds the lock. Expected; the caller skips this run. */
export class LockContention extends TaskMirrorError {
  constructor(readonly key: string) {
    super(`Lock "${key}" is held elsewhere`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
