/**
 * Application error taxonomy.
 *
 * Every error thrown on purpose by the service layer extends AppError.
 * The global error handler in app.ts renders them as
 * `{ status: 'error', message }` with the carried status code.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'INVALID_ID'
  | 'STORE_ERROR';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(statusCode: number, code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Missing, malformed or out-of-range input. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class AuthError extends AppError {
  constructor(message = 'Unauthorized') {
    super(401, 'UNAUTHORIZED', message);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Observation not found') {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * Identifier that is not a valid ObjectId. Answers 500 with the same
 * message as a store failure of the operation that received it.
 */
export class InvalidIdError extends AppError {
  readonly id: string;

  constructor(id: string, message: string) {
    super(500, 'INVALID_ID', message);
    this.name = 'InvalidIdError';
    this.id = id;
  }
}

/** The collection could not be reached or the driver failed. */
export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, 'STORE_ERROR', message, { cause });
    this.name = 'StoreError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
