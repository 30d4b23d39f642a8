import { Global, Module } from '@nestjs/common';
import { JsonLogger } from './json-logger.service';

/**
 * LoggingModule - one shared JsonLogger for the whole application.
 * Built by factory: the optional context string is not an injectable.
 */
@Global()
@Module({
  providers: [{ provide: JsonLogger, useFactory: () => new JsonLogger() }],
  exports: [JsonLogger]
})
export class LoggingModule {}
