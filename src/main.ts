import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { appConfig } from './config/app.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  const isDevelopment = config.nodeEnv === 'development';

  app.enableCors({
    origin: isDevelopment ? true : config.corsOrigins.length > 0 ? config.corsOrigins : false,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  if (!isDevelopment && config.corsOrigins.length === 0) {
    logger.warn('CORS_ORIGINS가 설정되지 않아 CORS를 허용하지 않습니다.');
  }

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalPipes(createValidationPipe());

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Theatre Booking API')
      .setVersion('0.1.0')
      .addBearerAuth()
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  await app.listen(config.port);

  logger.log(`Application is running on: http://localhost:${config.port}/api`);
  logger.log(`Environment: ${config.nodeEnv}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('애플리케이션 시작 실패', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
