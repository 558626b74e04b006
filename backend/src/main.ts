import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { REVIEW_CONFIG, ReviewConfig } from './infrastructure/config/ReviewConfig';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { rawBody: true });
  const logger = new Logger('Bootstrap');

  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const config = app.get<ReviewConfig>(REVIEW_CONFIG);
  await app.listen(config.port);
  logger.log(`Review service listening on port ${config.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
