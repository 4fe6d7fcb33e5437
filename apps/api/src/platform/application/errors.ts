export type WorkflowErrorCode =
  | 'not_found'
  | 'precondition_failed'
  | 'validation_failed'
  | 'concurrency_conflict'
  | 'dependency_failure';

export class WorkflowError extends Error {
  constructor(
    message: string,
    readonly code: WorkflowErrorCode,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class NotFoundError extends WorkflowError {
  constructor(message = 'Resource not found') {
    super(message, 'not_found');
    this.name = 'NotFoundError';
  }
}

export class PreconditionFailedError extends WorkflowError {
  constructor(message: string, cause?: unknown) {
    super(message, 'precondition_failed', cause);
    this.name = 'PreconditionFailedError';
  }
}

export class ValidationFailedError extends WorkflowError {
  constructor(
    message: string,
    readonly details: readonly string[] = []
  ) {
    super(message, 'validation_failed');
    this.name = 'ValidationFailedError';
  }
}

/** A conditional write found the row changed since it was read. */
export class ConcurrencyConflictError extends WorkflowError {
  constructor(message = 'Concurrency conflict', cause?: unknown) {
    super(message, 'concurrency_conflict', cause);
    this.name = 'ConcurrencyConflictError';
  }
}

export class DependencyFailureError extends WorkflowError {
  constructor(message: string, cause?: unknown) {
    super(message, 'dependency_failure', cause);
    this.name = 'DependencyFailureError';
  }
}
