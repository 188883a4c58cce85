import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import helmet from 'helmet';
import { json, urlencoded } from 'express';
import { UpdateExceptionFilter } from './common/update-exception.filter';
import { UpdateLoggingInterceptor } from './common/update-logging.interceptor';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');
  const isProduction = configService.get<string>('NODE_ENV') === 'production';

  // SECURITY: Helmet for HTTP security headers
  app.use(helmet({
    hsts: isProduction ? { maxAge: 31536000, includeSubDomains: true } : false,
    frameguard: { action: 'deny' },
    noSniff: true,
    referrerPolicy: { policy: 'no-referrer' },
  }));

  // SECURITY: Body size limits to prevent DoS
  app.use(json({ limit: '100kb' }));
  app.use(urlencoded({ extended: true, limit: '100kb' }));

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    })
  );

  app.useGlobalFilters(new UpdateExceptionFilter());
  app.useGlobalInterceptors(new UpdateLoggingInterceptor());
  app.enableShutdownHooks();

  // API prefix
  app.setGlobalPrefix('api/v1');

  const port = configService.get<number>('PORT', 3001);
  await app.listen(port);

  logger.log(`Tidewater update service running on http://localhost:${port}`);
  if (!configService.get<string>('ADMIN_TOKEN')) {
    logger.warn('ADMIN_TOKEN is not set - admin routes will refuse every request');
  }
  if (!configService.get<string>('UPDATE_GATEWAY_KEY')) {
    logger.warn('UPDATE_GATEWAY_KEY is not set - gateway responses will fail signature checks');
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
