import { OnModuleDestroy } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import { drizzle, PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { ErrorKind } from '../../common/errors';
import * as schema from '../schema';
import { Store, TransactionWork } from '../store';
import { drizzleTransaction } from './drizzle-repositories';
import { translateStorageError } from './storage-errors';

export interface DrizzleStoreOptions {
  url: string;
  poolMax: number;
}

export class DrizzleStore extends Store implements OnModuleDestroy {
  private readonly client: postgres.Sql;
  private readonly db: PostgresJsDatabase<typeof schema>;

  constructor(options: DrizzleStoreOptions) {
    super();
    this.client = postgres(options.url, {
      max: options.poolMax,
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => this.logger.warn({ msg: 'Postgres notice', notice }),
    });
    this.db = drizzle(this.client, { schema });
  }

  protected async runTransaction<T>(work: TransactionWork<T>): Promise<T> {
    try {
      return await this.db.transaction((tx) => work(drizzleTransaction(tx)));
    } catch (err) {
      const translated = translateStorageError(err);
      if (translated.kind === ErrorKind.STORAGE_FAILURE) {
        this.logger.error({ msg: 'Storage failure', error: err instanceof Error ? err.message : String(err) });
      }
      throw translated;
    }
  }

  async ping() {
    await this.db.execute(sql`select 1`);
  }

  async onModuleDestroy() {
    await this.client.end({ timeout: 5 });
  }
}
