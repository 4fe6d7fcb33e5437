import { ConcurrencyConflictError } from '../../application/errors';

const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';
export const UNIQUE_VIOLATION = '23505';

export const postgresErrorCode = (error: unknown): string | null => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }
  const { code } = error;
  return typeof code === 'string' ? code : null;
};

/**
 * Maps Postgres write-conflict failures onto `ConcurrencyConflictError` so the
 * services see one conflict type whatever the store reported.
 */
export const translatePersistenceError = (error: unknown): unknown => {
  const code = postgresErrorCode(error);
  if (code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED) {
    return new ConcurrencyConflictError('Write conflict detected', error);
  }
  return error;
};
