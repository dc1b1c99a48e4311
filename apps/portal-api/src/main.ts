/**
 * Portal API
 * Main entry point
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import cookieParser from 'cookie-parser';
import { PortalErrorFilter } from '@portal/common/errors';
import { AppModule } from './app.module';

async function bootstrap() {
  const logger = new Logger('Portal API');
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  app.useGlobalFilters(
    new PortalErrorFilter(configService.get<boolean>('exposeErrorDetail', false)),
  );

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.use(cookieParser());

  // Device cookie needs credentials; without an origin only same-origin callers work
  const corsOrigin = configService.get<string>('corsOrigin');
  if (corsOrigin) {
    app.enableCors({
      origin: corsOrigin.split(',').map((origin) => origin.trim()),
      credentials: true,
    });
  } else {
    logger.warn('CORS_ORIGIN not set; cross-origin requests are rejected');
  }

  const port = configService.get<number>('port', 8000);
  await app.listen(port);

  logger.log(`Portal API listening on port ${port}`);
}

bootstrap().catch((error: Error) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start Portal API', error.stack);
  process.exit(1);
});
