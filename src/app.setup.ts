import {
  ValidationPipe,
  VersioningType,
  type INestApplication,
} from '@nestjs/common';
import compression from 'compression';
import helmet from 'helmet';

/** HTTP pipeline shared by main.ts and the e2e tests */
export function configureApp(app: INestApplication): INestApplication {
  // Security + performance
  app.use(helmet());
  app.use(compression());

  // Global URL prefix and versioning (e.g., /api/v1/...)
  app.setGlobalPrefix('api');
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.enableCors({ origin: true, credentials: true });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // SIGTERM/SIGINT run onModuleDestroy, which flushes the request log
  app.enableShutdownHooks();
  return app;
}
