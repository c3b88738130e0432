import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import type { Server } from 'http';
import { AppModule } from './app.module';
import { PgExceptionFilter } from './common/pg-exception.filter';

const logger = new Logger('Bootstrap');

function readPositiveInt(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const parsed = Number.parseInt(config.get<string>(key) ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function allowedOrigins(config: ConfigService): string[] {
  const origins = (config.get<string>('CORS_ORIGIN') ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins.length ? origins : ['http://localhost:5173'];
}

/** Node requires headersTimeout to outlast keepAliveTimeout. */
function applyServerTimeouts(server: Server, config: ConfigService) {
  server.requestTimeout = readPositiveInt(
    config,
    'REQUEST_TIMEOUT_MS',
    120_000,
  );
  server.keepAliveTimeout = readPositiveInt(
    config,
    'KEEP_ALIVE_TIMEOUT_MS',
    5_000,
  );
  server.headersTimeout = Math.max(
    readPositiveInt(config, 'HEADERS_TIMEOUT_MS', 121_000),
    server.keepAliveTimeout + 1_000,
  );
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const config = app.get(ConfigService);

  app.use(helmet());
  app.enableCors({ origin: allowedOrigins(config), credentials: true });
  app.setGlobalPrefix('api');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new PgExceptionFilter());
  app.enableShutdownHooks();

  const port = readPositiveInt(config, 'PORT', 3000);
  await app.listen(port, '0.0.0.0');
  applyServerTimeouts(app.getHttpServer(), config);

  logger.log(`Helpdesk API listening on port ${port} under /api`);
}

bootstrap().catch((error) => {
  logger.error(
    'Helpdesk API failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
