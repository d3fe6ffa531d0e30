import 'reflect-metadata';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import express from 'express';
import { Logger, PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { WEBHOOK_PATHS, webhookBodyErrorHandler } from './callbacks/filters/webhook-body-error.handler';

/**
 * Expects an app created with `bodyParser: false`: the parsers are registered here so the
 * webhook paths can acknowledge bodies they fail to parse.
 */
export async function configureApp<T extends INestApplication>(app: T): Promise<T> {
  const logger = await app.resolve(PinoLogger);
  logger.setContext('WebhookBodyParser');

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(WEBHOOK_PATHS, webhookBodyErrorHandler(logger));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  return app;
}

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    bodyParser: false,
  });
  app.useLogger(app.get(Logger));
  app.enableCors();
  await configureApp(app);

  const port = parseInt(process.env.PORT ?? '3000', 10);
  await app.listen(port);
  app.get(Logger).log(`Payment broker listening on port ${port}`);
}

if (require.main === module) {
  bootstrap().catch(error => {
    console.error('Failed to start payment broker', error);
    process.exit(1);
  });
}
