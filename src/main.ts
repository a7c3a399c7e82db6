import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger as NestLogger, ValidationPipe, VersioningType } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import * as Sentry from '@sentry/node';
import { randomUUID } from 'crypto';
import { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { RequestContextService } from './common/context/request-context.service';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { SanitizeInputPipe } from './common/pipes/sanitize-input.pipe';
import { validationExceptionFactory } from './common/pipes/validation-exception.factory';

if (process.env.SENTRY_DSN) {
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.2'),
    environment: process.env.NODE_ENV,
  });
}

function parseOrigins(raw: string, onInvalid: (pattern: string, reason: string) => void) {
  const literal = new Set<string>();
  const patterns: RegExp[] = [];
  for (const entry of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (!entry.toLowerCase().startsWith('regex:')) {
      literal.add(entry);
      continue;
    }
    const pattern = entry.slice(6);
    try {
      patterns.push(new RegExp(pattern));
    } catch (error) {
      onInvalid(pattern, error instanceof Error ? error.message : String(error));
    }
  }
  return { literal, patterns };
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });
  const configService = app.get(ConfigService);
  const logger = app.get(Logger);
  app.useLogger(logger);
  const prefix = configService.get<string>('API_PREFIX') ?? 'api';

  const context = app.get(RequestContextService);
  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers['x-correlation-id'];
    const correlationId = (typeof header === 'string' && header) || randomUUID();
    req.headers['x-correlation-id'] = correlationId;
    res.setHeader('x-correlation-id', correlationId);
    context.run(next, { correlationId, ip: req.ip, userAgent: req.headers['user-agent'] });
  });

  app.setGlobalPrefix(prefix);
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.useGlobalPipes(
    new SanitizeInputPipe(),
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
      exceptionFactory: validationExceptionFactory,
    }),
  );
  app.useGlobalInterceptors(app.get(ResponseInterceptor));
  app.useGlobalFilters(app.get(AllExceptionsFilter));

  app.use(
    helmet({
      crossOriginOpenerPolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: false,
      hsts: { maxAge: 31536000 },
    }),
  );

  const production = configService.get<string>('NODE_ENV') === 'production';
  if (!production || configService.get<string>('SWAGGER_ENABLED') === 'true') {
    const config = new DocumentBuilder()
      .setTitle('Dry Cleaning API')
      .setDescription('Shops, catalog, orders and loyalty for dry-cleaning businesses')
      .setVersion('1.0.0')
      .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT', in: 'header', name: 'Authorization' })
      .addServer(`/${prefix}/v1`, 'v1')
      .build();
    SwaggerModule.setup(`${prefix}/docs`, app, SwaggerModule.createDocument(app, config), {
      swaggerOptions: { persistAuthorization: true },
    });
  } else {
    logger.log('Swagger is disabled for production. Set SWAGGER_ENABLED=true to re-enable.', 'Bootstrap');
  }

  const origins = parseOrigins(configService.get<string>('ALLOWED_ORIGINS') ?? '', (pattern, reason) =>
    logger.warn(`Invalid CORS regex "${pattern}": ${reason}`),
  );
  const localhost = [/^https?:\/\/localhost(?::\d+)?$/i, /^https?:\/\/127\.0\.0\.1(?::\d+)?$/i];
  app.enableCors({
    origin(origin, callback) {
      if (!origin) return callback(null, true);
      if (origins.literal.has(origin) || origins.patterns.some((rx) => rx.test(origin))) {
        return callback(null, true);
      }
      if (!production && localhost.some((rx) => rx.test(origin))) {
        return callback(null, true);
      }
      logger.warn(`Rejected CORS origin "${origin}"`);
      return callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'X-Correlation-Id', 'X-Refresh-Token'],
    optionsSuccessStatus: 204,
  });

  app.enableShutdownHooks();
  const port = configService.get<number>('PORT') ?? 4000;
  await app.listen(port);
}

bootstrap().catch((err: unknown) => {
  new NestLogger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
