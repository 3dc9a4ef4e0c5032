import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './modules/app.module';
import { DEFAULT_UPLOADS_DIR, UPLOADS_ROUTE_PREFIX } from './modules/common/upload.constants';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  const config = app.get(ConfigService);
  const port = Number(config.get<string>('PORT')) || 3006;
  const corsOrigin = config.get<string>('CORS_ORIGIN') || '*';
  const uploadsDir = config.get<string>('UPLOADS_DIR') || DEFAULT_UPLOADS_DIR;

  app.enableCors({
    origin: corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Origin', 'Content-Type', 'Content-Length', 'Accept-Encoding', 'Authorization'],
    exposedHeaders: ['Content-Length'],
    // Browsers refuse credentials alongside a wildcard origin.
    credentials: corsOrigin !== '*',
    maxAge: 12 * 60 * 60,
  });
  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, transform: true, forbidNonWhitelisted: true }),
  );
  app.useStaticAssets(uploadsDir, { prefix: UPLOADS_ROUTE_PREFIX });
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`Server listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error(`Failed to start server: ${String(error)}`);
  process.exit(1);
});
