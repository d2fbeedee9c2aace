/**
 * Error taxonomy for profile operations.
 *
 * `publicMessage` is the only text that reaches the caller. The underlying
 * failure rides along on `cause` and is logged server-side.
 */

export type ErrorStatus = 400 | 404 | 500;

export class AppError extends Error {
  constructor(
    readonly status: ErrorStatus,
    readonly code: string,
    readonly publicMessage: string,
    options?: { cause?: unknown },
  ) {
    super(publicMessage, options);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, readonly details?: Array<{ path: string; message: string }>) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class GenerationError extends AppError {
  constructor(message = 'Failed to generate AI profile') {
    super(500, 'GENERATION_FAILED', message);
    this.name = 'GenerationError';
  }
}

export class PersistenceError extends AppError {
  constructor(cause: unknown) {
    super(500, 'PERSISTENCE_FAILED', 'Internal server error', { cause });
    this.name = 'PersistenceError';
  }
}
