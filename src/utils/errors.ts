import { logger } from './logger';

export type ErrorCode =
  | 'NotFound'
  | 'OutOfStock'
  | 'AlreadyReturned'
  | 'InvalidDate'
  | 'DuplicateLoan'
  | 'ConstraintViolation'
  | 'SerializationConflict'
  | 'Forbidden'
  | 'Validation';

/**
 * Base class for every error the library core hands back to its callers
 */
export class AppError extends Error {
  code: ErrorCode;
  isOperational: boolean;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = true; // Operational errors vs programming errors

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 'NotFound');
  }
}

export class OutOfStockError extends AppError {
  constructor(message: string = 'No copies available') {
    super(message, 'OutOfStock');
  }
}

export class AlreadyReturnedError extends AppError {
  constructor(message: string = 'Loan already returned') {
    super(message, 'AlreadyReturned');
  }
}

export class InvalidDateError extends AppError {
  constructor(message: string = 'Invalid date') {
    super(message, 'InvalidDate');
  }
}

export class DuplicateLoanError extends AppError {
  constructor(message: string = 'Book already borrowed by this user') {
    super(message, 'DuplicateLoan');
  }
}

export class ConstraintViolationError extends AppError {
  constructor(message: string = 'Constraint violation') {
    super(message, 'ConstraintViolation');
  }
}

export class SerializationConflictError extends AppError {
  constructor(message: string = 'Transaction conflicted with a concurrent update') {
    super(message, 'SerializationConflict');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 'Forbidden');
  }
}

export class ValidationError extends AppError {
  constructor(message: string = 'Invalid input') {
    super(message, 'Validation');
  }
}

/**
 * SQLSTATE of a driver error, if it carries one
 */
export function getDatabaseErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Serialization failure or deadlock: the transaction may succeed if rerun
 */
export function isRetryableDatabaseError(error: unknown): boolean {
  const code = getDatabaseErrorCode(error);
  return code === '40001' || code === '40P01';
}

/**
 * Database error translator
 * Converts PostgreSQL errors into library errors; AppErrors pass through
 */
export function translateDatabaseError(error: unknown): Error {
  if (error instanceof AppError) {
    return error;
  }

  const code = getDatabaseErrorCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  switch (code) {
    case '23505':
      // Unique violation
      return new ConstraintViolationError(`Resource already exists: ${detail}`);
    case '23503':
      // Foreign key violation
      return new ConstraintViolationError(`Referenced resource does not exist: ${detail}`);
    case '23514':
      // Check violation
      return new ConstraintViolationError(`Check constraint failed: ${detail}`);
    case '23502':
      // Not null violation
      return new ConstraintViolationError(`Required field is missing: ${detail}`);
    case '40001':
    case '40P01':
      return new SerializationConflictError();
    default:
      return error instanceof Error ? error : new Error(detail);
  }
}

/**
 * Database error handler
 * Logs and rethrows the translated error
 */
export function handleDatabaseError(error: unknown): never {
  const translated = translateDatabaseError(error);
  if (!(translated instanceof AppError)) {
    logger.error('Database error:', { message: translated.message });
  }
  throw translated;
}
