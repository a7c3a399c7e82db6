import { DynamicModule, Logger, Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import * as dotenv from 'dotenv';
import { NotificationsController } from './notifications.controller';
import { NotificationsProcessor } from './notifications.processor';
import { NotificationsService } from './notifications.service';
import { NOTIFICATIONS_QUEUE } from './notifications.types';

@Module({})
export class NotificationsModule {
  static register(): DynamicModule {
    // the flag decides the module graph, so it is read before ConfigModule validates
    dotenv.config();
    const redisEnabled = process.env.REDIS_ENABLED === 'true';
    if (!redisEnabled) {
      new Logger(NotificationsModule.name).warn('REDIS_ENABLED is not true; notifications are processed inline');
    }

    const queueImports = redisEnabled
      ? [
          BullModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (config: ConfigService) => {
              const url = new URL(config.getOrThrow<string>('REDIS_URL'));
              return {
                connection: {
                  host: url.hostname,
                  port: Number(url.port || 6379),
                  username: url.username || undefined,
                  password: url.password || undefined,
                },
                defaultJobOptions: {
                  attempts: 3,
                  backoff: { type: 'exponential', delay: 2000 },
                  removeOnComplete: 25,
                  removeOnFail: 50,
                },
              };
            },
          }),
          BullModule.registerQueue({ name: NOTIFICATIONS_QUEUE }),
        ]
      : [];

    return {
      module: NotificationsModule,
      global: true,
      imports: queueImports,
      providers: [NotificationsProcessor, NotificationsService],
      controllers: [NotificationsController],
      exports: [NotificationsService],
    };
  }
}
