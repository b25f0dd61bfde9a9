import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { AllExceptionsFilter } from './shared/filters/all-exceptions.filter';
import { LoggingInterceptor } from './shared/interceptors/logging.interceptor';
import { loadAppConfig } from './shared/config/app.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = loadAppConfig();

  // Structured logging
  app.useLogger(app.get(Logger));

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new AllExceptionsFilter());

  // Global logging interceptor
  app.useGlobalInterceptors(new LoggingInterceptor());

  // Save the store on SIGINT/SIGTERM
  app.enableShutdownHooks();

  // Swagger
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Customer Interaction Register')
      .setDescription(
        'Customers keyed by tax code and the interactions recorded with them, ' +
          'kept in memory and persisted to pipe-delimited text files.',
      )
      .setVersion('1.0')
      .addTag('customers', 'Customer records and their interactions')
      .addTag('interactions', 'Search across all interactions')
      .addTag('store', 'Save and reload the data files')
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
  logger.log(
    `Data files: ${config.files.customersFile}, ${config.files.interactionsFile}`,
  );
}
void bootstrap();
