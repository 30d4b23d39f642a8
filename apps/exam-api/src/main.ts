// reflect-metadata must load before any decorated class
import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { JsonLogger } from './logging/json-logger.service';

async function bootstrap() {
  // bufferLogs queues startup logs until JsonLogger is attached
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const logger = app.get(JsonLogger);
  app.useLogger(logger);

  configureApp(app, logger);

  const config = app.get(ConfigService);

  if (config.get<boolean>('SWAGGER_ENABLED')) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Exam Results API')
      .setDescription('Session tokens, role permissions and the exam grading ledger')
      .setVersion('1.0.0')
      .addBearerAuth(
        {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          name: 'Authorization',
          in: 'header'
        },
        'bearer'
      )
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: { persistAuthorization: true }
    });
  }

  const port = config.get<number>('PORT') ?? 3000;
  await app.listen(port);
  logger.log('Exam API listening', { port, dataStore: config.get<string>('DATA_STORE') });
}

bootstrap().catch((error: unknown) => {
  const logger = new JsonLogger('bootstrap');
  logger.error(error instanceof Error ? error : String(error));
  process.exitCode = 1;
});
