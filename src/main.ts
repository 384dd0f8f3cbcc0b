import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { env } from './config/env';
import { enabledLogLevels } from './config/logger';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { logger: enabledLogLevels(env.logLevel) });
  configureApp(app);
  app.enableShutdownHooks();
  await app.listen(env.port);
  logger.log(`Listening on http://localhost:${env.port} (${env.dbType}, ${env.nodeEnv})`);
}

bootstrap().catch((err: unknown) => {
  logger.error('Failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
