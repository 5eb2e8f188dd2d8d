/**
 * Base class for failures that map to a specific HTTP response.
 * The global error handler renders `statusCode` and `code` through formatError.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, 400, code);
    this.name = 'ValidationError';
  }
}

// A business precondition did not hold (booking already started, not completed, ...)
export class PreconditionError extends AppError {
  constructor(message: string, code = 'INVALID_PRECONDITION') {
    super(message, 400, code);
    this.name = 'PreconditionError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required', code = 'UNAUTHENTICATED') {
    super(message, 401, code);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, code = 'FORBIDDEN') {
    super(message, 403, code);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code = 'NOT_FOUND') {
    super(message, 404, code);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code = 'CONFLICT') {
    super(message, 409, code);
    this.name = 'ConflictError';
  }
}

interface DatabaseError {
  code: string;
  constraint_name?: string;
}

/**
 * postgres-js surfaces server errors with the SQLSTATE in `code`
 */
export const isDatabaseError = (error: unknown): error is DatabaseError =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string';

export const isUniqueViolation = (error: unknown): boolean => isDatabaseError(error) && error.code === '23505';
