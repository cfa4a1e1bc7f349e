import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import helmet from '@fastify/helmet';
import { Postgres } from '@docqa/database';
import { AppModule } from './app.module.js';
import { configureApp } from './common/setup-app.js';
import { ConfigurationService } from './config/configuration.js';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create<NestFastifyApplication>(
      AppModule,
      new FastifyAdapter({ bodyLimit: 20 * 1024 * 1024 })
    );

    const config = app.get(ConfigurationService);

    await app.register(helmet, { crossOriginResourcePolicy: false });
    configureApp(app, config);
    app.enableShutdownHooks();

    app.enableCors({
      origin: true,
      methods: ['GET', 'HEAD', 'POST', 'DELETE', 'OPTIONS'],
      credentials: true,
      allowedHeaders: ['Content-Type', 'Authorization'],
    });

    await app.listen(config.port, '0.0.0.0');

    logger.log(`Application is running on: ${await app.getUrl()}`);
    logger.log(`Environment: ${config.nodeEnv}`);
    logger.log(`Vector store: ${config.vectorStore}`);
  } catch (error) {
    logger.error('Failed to start application', error);
    await Postgres.shutdown();
    process.exit(1);
  }
}

void bootstrap();
