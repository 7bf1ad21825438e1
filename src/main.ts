import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import configuration, { logLevelsFrom } from './config/configuration';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: logLevelsFrom(configuration().logLevel),
  });
  configureApp(app);

  const port = app.get(ConfigService).get<number>('port') ?? 8000;
  await app.listen(port);
  Logger.log(`API listening on http://localhost:${port}/api/v1`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  const detail = error instanceof Error ? error.stack : String(error);
  Logger.error('Failed to start', detail, 'Bootstrap');
  process.exit(1);
});
