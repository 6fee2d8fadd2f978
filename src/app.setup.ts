import { RequestMethod, ValidationPipe } from '@nestjs/common';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { AppConfig } from './config/app.config';
import { AllExceptionsFilter } from './common/filters';

export const API_PREFIX = 'api/v1';

/**
 * main.ts 와 HTTP 테스트가 같은 라우팅/파이프/필터 구성을 쓰도록 분리.
 */
export function configureApp(
  app: NestFastifyApplication,
  config: AppConfig,
): void {
  app.setGlobalPrefix(API_PREFIX, {
    exclude: [
      { path: '/', method: RequestMethod.GET },
      { path: 'health', method: RequestMethod.GET },
    ],
  });

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
    }),
  );
  app.useGlobalFilters(new AllExceptionsFilter());

  const allowAll = config.corsOrigins.includes('*');
  app.enableCors({
    origin: allowAll ? true : config.corsOrigins,
    credentials: true,
    methods: ['GET', 'OPTIONS'],
  });
}

export function setupSwagger(
  app: NestFastifyApplication,
  config: AppConfig,
): void {
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(config.name)
      .setDescription('Approval requests, deployment history and host status')
      .setVersion(config.version)
      .build(),
  );
  SwaggerModule.setup('docs', app, document);
}
