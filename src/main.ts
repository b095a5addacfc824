import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadAppConfig } from './shared/config/app.config';

async function bootstrap() {
  const config = loadAppConfig();
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  configureApp(app, config);

  // Swagger
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Customer Records Service')
      .setDescription(
        'Create, search, update and soft-delete customer records. ' +
          'Search supports free-text, exact email and creation-date filters with sorting and pagination; ' +
          'bulk creation reports per-item failures without aborting the batch.',
      )
      .setVersion('1.0')
      .addTag('customers', 'Customer search and maintenance')
      .addTag('health', 'Service health checks')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });

  await app.listen(config.port);

  const logger = app.get(Logger);
  logger.log(`Application running on http://localhost:${config.port}`);
  logger.log(`Swagger UI available at http://localhost:${config.port}/api/docs`);
}
void bootstrap();
