import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  type NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { configureApp } from './setup-app';

async function bootstrap() {
  const adapter = new FastifyAdapter({ trustProxy: true });
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter);
  app.enableShutdownHooks();

  await configureApp(app);

  const port = app.get(ConfigService).get<number>('app.port') || 3001;
  await app.listen({ port, host: '0.0.0.0' });

  new Logger('Bootstrap').log(`Gallery service listening on ${port}`);
}

bootstrap().catch((error) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : error);
  process.exit(1);
});
