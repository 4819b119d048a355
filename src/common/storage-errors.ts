import { QueryFailedError, TypeORMError } from 'typeorm';
import { ConflictError, CoreError, UnavailableError } from './errors';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

const FOREIGN_KEY_VIOLATION_CODES = new Set([
  '23503', // postgres foreign_key_violation
  'SQLITE_CONSTRAINT_FOREIGNKEY',
]);

function driverCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const code = driverCode(error.driverError);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
}

export function isForeignKeyViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const code = driverCode(error.driverError);
  return code !== undefined && FOREIGN_KEY_VIOLATION_CODES.has(code);
}

/**
 * Maps a failure raised inside a unit of work onto the core error kinds.
 * Errors that are neither core errors nor storage errors are returned as is.
 */
export function translateStorageError(error: unknown): unknown {
  if (error instanceof CoreError) {
    return error;
  }
  if (isUniqueViolation(error)) {
    return new ConflictError('A record with the same unique key already exists', {
      cause: error,
    });
  }
  if (isForeignKeyViolation(error)) {
    return new ConflictError('A referenced record no longer exists', {
      cause: error,
    });
  }
  if (error instanceof TypeORMError || driverCode(error) !== undefined) {
    return new UnavailableError({ cause: error });
  }
  return error;
}
