import { QueryFailedError } from 'typeorm';
import { ConflictError, ValidationError } from './errors';

function driverProperty(error: Error, key: 'code' | 'detail'): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

// postgres: Key (phone)=(555-1) already exists.
// sqlite:   UNIQUE constraint failed: customers.phone
function uniqueColumn(driverError: Error): string {
  const detail = driverProperty(driverError, 'detail') ?? '';
  const pg = /^Key \(([^)]+)\)/.exec(detail);
  if (pg) {
    return pg[1];
  }
  const sqlite = /UNIQUE constraint failed: \w+\.(\w+)/.exec(driverError.message);
  return sqlite ? sqlite[1] : 'unknown';
}

/**
 * Turns constraint failures reported by postgres or sqlite into domain errors.
 * A serialization failure is pinned on `conflictField`, the field the caller
 * was writing. Anything else is returned untouched.
 */
export function translateQueryError(error: unknown, conflictField: string): unknown {
  if (!(error instanceof QueryFailedError)) {
    return error;
  }
  const driverError: Error = error.driverError;
  switch (driverProperty(driverError, 'code')) {
    case '23505':
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY': {
      const field = uniqueColumn(driverError);
      return new ConflictError(field, `${field} is already in use`);
    }
    case '23503':
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new ValidationError('Invalid reference', {
        constraint: driverProperty(driverError, 'detail') ?? driverError.message,
      });
    case '22003':
      return new ValidationError('Value out of range', {
        constraint: driverProperty(driverError, 'detail') ?? driverError.message,
      });
    case '40001':
      return new ConflictError(conflictField, 'Concurrent modification, retry the request');
    default:
      return error;
  }
}
