import { describe, expect, it } from 'vitest';
import { ConcurrencyConflictError } from '../../src/platform/application/errors';
import {
  postgresErrorCode,
  translatePersistenceError,
} from '../../src/platform/infrastructure/database/persistence-errors';

describe('translatePersistenceError', () => {
  it.each(['40001', '40P01'])('maps %s to a concurrency conflict', (code) => {
    const driverError = Object.assign(new Error('could not serialize'), { code });

    const translated = translatePersistenceError(driverError);

    expect(translated).toBeInstanceOf(ConcurrencyConflictError);
    expect(translated).toMatchObject({ cause: driverError });
  });

  it('passes other errors through', () => {
    const driverError = Object.assign(new Error('duplicate key'), { code: '23505' });

    expect(translatePersistenceError(driverError)).toBe(driverError);
  });

  it('reads string codes only', () => {
    expect(postgresErrorCode({ code: 40001 })).toBeNull();
    expect(postgresErrorCode('40001')).toBeNull();
    expect(postgresErrorCode({ code: '40001' })).toBe('40001');
  });
});
