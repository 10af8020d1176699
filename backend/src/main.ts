import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  // Ports from environment
  const backendPort = process.env.BACKEND_PORT || process.env.PORT || 4001;
  const frontendPort = process.env.FRONTEND_PORT || 4000;

  const defaultOrigins = [
    `http://localhost:${frontendPort}`,
    `http://localhost:${backendPort}`,
  ];
  const corsOrigins = process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',').map((origin) => origin.trim())
    : defaultOrigins;

  configureApp(app, {
    corsOrigins,
    globalPrefix: process.env.API_PREFIX,
  });

  await app.listen(backendPort);
  logger.log(`Backend running on http://localhost:${backendPort}/${process.env.API_PREFIX ?? ''}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
