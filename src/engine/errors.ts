export type LifecycleErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'INCONSISTENT_REFERENCE'
  | 'PRECONDITION_FAILED'
  | 'STORE_UNAVAILABLE';

export class LifecycleError extends Error {
  readonly code: LifecycleErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: LifecycleErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Malformed or out-of-range input. `field` is a dotted path such as `budget.0.amount`. */
export class ValidationError extends LifecycleError {
  readonly field: string;
  constructor(field: string, message: string) {
    super('VALIDATION_ERROR', field ? `${field}: ${message}` : message, { field });
    this.field = field;
  }
}

export class NotFoundError extends LifecycleError {
  constructor(collection: string, id: string) {
    super('NOT_FOUND', `${collection} ${id} not found`, { collection, id });
  }
}

export class InvalidTransitionError extends LifecycleError {
  constructor(machine: string, from: string, to: string) {
    super('INVALID_TRANSITION', `${machine} cannot move from ${from} to ${to}`, { machine, from, to });
  }
}

export class InconsistentReferenceError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown>) {
    super('INCONSISTENT_REFERENCE', message, details);
  }
}

export class PreconditionFailedError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown>) {
    super('PRECONDITION_FAILED', message, details);
  }
}

export class StoreUnavailableError extends LifecycleError {
  constructor(operation: string, reason: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', `store ${operation} failed: ${reason}`, { operation }, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
