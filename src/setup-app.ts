import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import fastifyCors from '@fastify/cors';
import fastifyMultipart from '@fastify/multipart';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';

const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;

/**
 * Plugins, pipes and filters shared by the server bootstrap and the HTTP tests.
 */
export async function configureApp(app: NestFastifyApplication) {
  const configService = app.get(ConfigService);
  const apiPrefix = configService.get<string>('app.apiPrefix') || 'api';
  const corsOrigin = configService.get<string>('cors.origin') || '*';
  const maxFileSize =
    configService.get<number>('storage.maxFileSize') ?? DEFAULT_MAX_FILE_SIZE;

  await app.register(fastifyMultipart, {
    limits: {
      // Past this the part is truncated and reported as file_too_large
      fileSize: maxFileSize + 1,
      files: 1,
      fields: 5,
    },
  });

  await app.register(fastifyCors, {
    origin:
      corsOrigin === '*'
        ? true
        : corsOrigin.split(',').map((item) => item.trim()).filter(Boolean),
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  app.setGlobalPrefix(apiPrefix);
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter());

  return app;
}
