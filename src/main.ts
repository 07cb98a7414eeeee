import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { BufferedLogger, flushOnExit } from './config/logging.config';
import { errorMessage } from './common/types/telemetry.types';

const appLogger = new BufferedLogger();
flushOnExit(appLogger);

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: appLogger,
  });

  app.enableCors({
    origin: process.env.CORS_ORIGINS ? process.env.CORS_ORIGINS.split(',') : '*',
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
  });
  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));

  // Global prefix for API routes
  app.setGlobalPrefix('api/v1');

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Telemetry Service')
    .setDescription('Device telemetry ingestion, alerting and aggregation')
    .setVersion('1.0')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));

  app.enableShutdownHooks();

  const port = process.env.PORT || 3000;
  await app.listen(port);

  logger.log(`Telemetry service running on port ${port}`);
  logger.log(`API available at http://localhost:${port}/api/v1`);
  logger.log(`WebSocket available at ws://localhost:${port}`);
}

bootstrap().catch(error => {
  appLogger.error(
    `Failed to start telemetry service: ${errorMessage(error)}`,
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  appLogger.close();
  process.exit(1);
});
