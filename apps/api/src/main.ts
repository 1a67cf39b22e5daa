import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { PipelineExceptionFilter } from './common/pipeline-exception.filter';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // ── Global Filters ────────────────────────────────────
  app.useGlobalFilters(new PipelineExceptionFilter());

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>(
    'API_CORS_ORIGIN',
    'http://localhost:3000',
  );
  app.enableCors({ origin: corsOrigin });

  // Runs BeforeApplicationShutdown hooks on SIGTERM/SIGINT so in-flight
  // attempts are cancelled and recorded
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = configService.get<number>('API_PORT', 4000);
  await app.listen(port);

  logger.log(`Papertrail API running on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    `Startup failed: ${err instanceof Error ? err.message : String(err)}`,
  );
  process.exit(1);
});
