import type { ZodError } from 'zod';

export type FieldErrors = Record<string, string>;

/**
 * Base class for errors that map onto an HTTP status.
 */
export class AppError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/**
 * Bad user input. `fieldErrors` maps form field names to the message shown next to them.
 */
export class ValidationError extends AppError {
  readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super(message, 400);
    this.fieldErrors = fieldErrors;
  }
}

/**
 * The database rejected or failed a read/write. The driver error is kept as `cause`.
 */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}

/**
 * Collapse a zod failure into one message per field (the first issue wins).
 */
export function toValidationError(error: ZodError, message = 'Invalid input'): ValidationError {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'form';
    if (!(key in fieldErrors)) {
      fieldErrors[key] = issue.message;
    }
  }
  return new ValidationError(message, fieldErrors);
}

/**
 * Run a storage call, wrapping anything it throws in a StorageError.
 */
export function withStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new StorageError(`Failed to ${operation}`, err);
  }
}
