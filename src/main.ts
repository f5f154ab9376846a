import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { describeError } from './common/errors';
import { loadConfig } from './config/configuration';

async function bootstrap(): Promise<void> {
  const { logLevels } = loadConfig();
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
  });
  app.enableShutdownHooks();
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(`failed to start: ${describeError(e)}`);
  process.exit(1);
});
