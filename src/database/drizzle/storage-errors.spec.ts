import { DomainError, ErrorKind } from '../../common/errors';
import { translateStorageError } from './storage-errors';

const driverError = (fields: { code: string; constraint_name?: string }) =>
  Object.assign(new Error('driver failure'), fields);

describe('translateStorageError', () => {
  it.each(['40001', '40P01'])('maps SQLSTATE %s to a concurrency conflict', (code) => {
    expect(translateStorageError(driverError({ code })).kind).toBe(ErrorKind.CONCURRENCY_CONFLICT);
  });

  it('maps a duplicate order number to a concurrency conflict', () => {
    const err = driverError({ code: '23505', constraint_name: 'uq_orders_shop_number' });
    expect(translateStorageError(err).kind).toBe(ErrorKind.CONCURRENCY_CONFLICT);
  });

  it('maps any other unique violation to a conflict', () => {
    const err = driverError({ code: '23505', constraint_name: 'uq_users_phone' });
    const translated = translateStorageError(err);
    expect(translated.kind).toBe(ErrorKind.CONFLICT);
    expect(translated.userMessage).toBe('Record already exists');
  });

  it('finds the SQLSTATE on a wrapped cause', () => {
    const wrapped = new Error('query failed', { cause: driverError({ code: '40001' }) });
    expect(translateStorageError(wrapped).kind).toBe(ErrorKind.CONCURRENCY_CONFLICT);
  });

  it.each([
    ['another SQLSTATE', driverError({ code: '23503' })],
    ['a plain error', new Error('connection reset')],
    ['a non-error value', 'boom'],
  ])('maps %s to a storage failure', (_label, err) => {
    expect(translateStorageError(err).kind).toBe(ErrorKind.STORAGE_FAILURE);
  });

  it('passes domain errors through untouched', () => {
    const err = new DomainError(ErrorKind.NOT_FOUND, 'Order not found');
    expect(translateStorageError(err)).toBe(err);
  });
});
