import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

// SQLSTATE for unique_violation
const UNIQUE_VIOLATION = '23505';

type DriverError = Error & { code: string; constraint?: string };

function isDriverError(error: unknown): error is DriverError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Walk the cause chain looking for the driver error, since query builders
 * may wrap it.
 */
function findDriverError(error: unknown): DriverError | null {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (isDriverError(current) && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * True when the store rejected a write because of a unique constraint.
 *
 * @param constraint - when given, only a violation of this constraint or
 *   unique index matches
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  const driverError = findDriverError(error);
  if (!driverError || driverError.code !== UNIQUE_VIOLATION) return false;
  return constraint === undefined || driverError.constraint === constraint;
}

/**
 * Wrap an unexpected store failure. Callers raise this only after their
 * transaction has rolled back.
 */
export function persistenceError(operation: string, cause: unknown): AppError {
  const error = new AppError(
    `Failed to ${operation}`,
    500,
    false,
    ErrorCodes.DATABASE_ERROR,
    { operation }
  );
  error.cause = cause;
  return error;
}
