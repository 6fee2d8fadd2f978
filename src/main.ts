import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { API_PREFIX, configureApp, setupSwagger } from './app.setup';
import { appConfig } from './config/app.config';
import type { AppConfig } from './config/app.config';
import { resolveLogLevels } from './common/logger/log-levels';

async function bootstrap() {
  const adapter = new FastifyAdapter({
    trustProxy: true,
  });
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    adapter,
    { bufferLogs: true },
  );

  const config = app.get<AppConfig>(appConfig.KEY);
  app.useLogger(resolveLogLevels(config.logLevel));

  configureApp(app, config);

  if (config.environment !== 'production') {
    setupSwagger(app, config);
  }

  await app.listen(config.port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 Server is running on http://0.0.0.0:${config.port}`);
  logger.log(`📍 Environment: ${config.environment}`);
  logger.log(`🔗 API Base Path: /${API_PREFIX}`);
}
void bootstrap();
