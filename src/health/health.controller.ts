import { Controller, Get, Head } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService, HealthIndicatorResult } from '@nestjs/terminus';
import { version as nodeVersion } from 'process';
import { Store } from '../database/store';

@ApiTags('System')
@Controller({ path: '', version: ['1'] })
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly store: Store,
    private readonly config: ConfigService,
  ) {}

  @Get('health')
  @HealthCheck()
  healthcheck() {
    return this.health.check([() => this.databaseCheck()]);
  }

  @Get('live')
  @Head('live')
  liveness() {
    return { ok: true };
  }

  @Get('metrics')
  metrics() {
    const mem = process.memoryUsage();
    return {
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
      node: nodeVersion,
      memory: { rss: mem.rss, heapUsed: mem.heapUsed, heapTotal: mem.heapTotal },
      services: {
        database: this.config.get<string>('DATABASE_DRIVER') ?? 'postgres',
        queue: this.config.get<string>('REDIS_ENABLED') === 'true' ? 'enabled' : 'inline',
      },
    };
  }

  private async databaseCheck(): Promise<HealthIndicatorResult> {
    await this.store.ping();
    return { database: { status: 'up' } };
  }
}
