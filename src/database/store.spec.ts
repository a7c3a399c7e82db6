import { DomainError, ErrorKind } from '../common/errors';
import { emptyTables, memoryTransaction } from './memory/memory-store';
import { Store, TransactionWork } from './store';

/** Fails the first `failures.length` attempts with the queued errors, then runs the work. */
class ScriptedStore extends Store {
  attempts = 0;

  constructor(private readonly failures: Error[]) {
    super();
  }

  protected async runTransaction<T>(work: TransactionWork<T>): Promise<T> {
    const failure = this.failures[this.attempts];
    this.attempts += 1;
    if (failure) throw failure;
    return work(memoryTransaction(emptyTables()));
  }

  async ping() {
    return;
  }
}

const conflict = () => new DomainError(ErrorKind.CONCURRENCY_CONFLICT, 'Concurrent update detected, please retry');

describe('Store.transaction', () => {
  it('retries once after a concurrency conflict', async () => {
    const store = new ScriptedStore([conflict()]);
    await expect(store.transaction(async () => 'done')).resolves.toBe('done');
    expect(store.attempts).toBe(2);
  });

  it('surfaces a second conflict instead of retrying again', async () => {
    const store = new ScriptedStore([conflict(), conflict()]);
    await expect(store.transaction(async () => 'done')).rejects.toMatchObject({
      kind: ErrorKind.CONCURRENCY_CONFLICT,
    });
    expect(store.attempts).toBe(2);
  });

  it('does not retry other failures', async () => {
    const store = new ScriptedStore([new DomainError(ErrorKind.CONFLICT, 'Record already exists')]);
    await expect(store.transaction(async () => 'done')).rejects.toMatchObject({ kind: ErrorKind.CONFLICT });
    expect(store.attempts).toBe(1);
  });
});
