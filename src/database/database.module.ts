import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DrizzleStore } from './drizzle/drizzle-store';
import { MemoryStore } from './memory/memory-store';
import { Store } from './store';

@Global()
@Module({
  providers: [
    {
      provide: Store,
      inject: [ConfigService],
      useFactory: (config: ConfigService): Store => {
        const driver = config.get<string>('DATABASE_DRIVER') ?? 'postgres';
        if (driver === 'memory') {
          new Logger('DatabaseModule').warn('Using the in-process store; data is lost on restart');
          return new MemoryStore();
        }
        return new DrizzleStore({
          url: config.getOrThrow<string>('DATABASE_URL'),
          poolMax: config.get<number>('DB_POOL_MAX') ?? 10,
        });
      },
    },
  ],
  exports: [Store],
})
export class DatabaseModule {}
