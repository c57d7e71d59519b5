/**
 * ContactBook API
 * Main entry point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ContactBookErrorFilter } from '@contactbook/common/errors';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('ContactBook API');
  const app = await NestFactory.create(AppModule);

  app.useGlobalFilters(new ContactBookErrorFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: process.env.CORS_ORIGIN || 'http://localhost',
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
  });

  // Pool, redis client and sweep timers are released on SIGTERM
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('port') ?? 8000;
  await app.listen(port);

  logger.log(`ContactBook API listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start ContactBook API', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
