import { DomainError, ErrorKind } from '../../common/errors';

const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';
const UNIQUE_VIOLATION = '23505';
const ORDER_NUMBER_INDEX = 'uq_orders_shop_number';

interface SqlState {
  code: string;
  constraint?: string;
}

/** First error in the cause chain that carries a SQLSTATE, as the postgres driver raises them. */
function sqlStateOf(err: unknown): SqlState | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      const constraint =
        'constraint_name' in current && typeof current.constraint_name === 'string'
          ? current.constraint_name
          : undefined;
      return { code: current.code, constraint };
    }
    current = current.cause;
  }
  return undefined;
}

/** Maps a driver failure onto the error taxonomy. */
export function translateStorageError(err: unknown): DomainError {
  if (err instanceof DomainError) return err;
  const state = sqlStateOf(err);
  if (state?.code === SERIALIZATION_FAILURE || state?.code === DEADLOCK_DETECTED) {
    return new DomainError(ErrorKind.CONCURRENCY_CONFLICT, 'Concurrent update detected, please retry');
  }
  if (state?.code === UNIQUE_VIOLATION) {
    if (state.constraint === ORDER_NUMBER_INDEX) {
      return new DomainError(ErrorKind.CONCURRENCY_CONFLICT, 'Order number already taken');
    }
    return new DomainError(ErrorKind.CONFLICT, 'Record already exists');
  }
  return new DomainError(ErrorKind.STORAGE_FAILURE, 'Storage operation failed');
}
