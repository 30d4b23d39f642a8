import { INestApplication, ValidationPipe } from '@nestjs/common';
import { HttpErrorFilter } from './common/filters/http-error.filter';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import type { JsonLogger } from './logging/json-logger.service';

/**
 * Request pipeline shared by bootstrap and the HTTP tests:
 * request logging, body/query validation and the error envelope.
 */
export function configureApp(app: INestApplication, logger: JsonLogger): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true
    })
  );

  app.use(createHttpLoggingMiddleware(logger));
  app.useGlobalFilters(new HttpErrorFilter(logger));
  return app;
}
