import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';

type JsonLevel = 'info' | 'warn' | 'error' | 'debug' | 'verbose';
type LogMeta = Record<string, unknown>;

/**
 * JSON line logger: every entry is written as {ts, level, context, msg, ...meta}
 * so log shippers can parse it without extra agents.
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(context?: string) {
    super(context ?? 'exam-api');
  }

  private normalizeError(error: unknown): LogMeta {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    if (typeof error === 'object' && error !== null) {
      try {
        const copy: LogMeta = JSON.parse(JSON.stringify(error));
        return copy;
      } catch {
        return { value: String(error) };
      }
    }

    return { value: String(error) };
  }

  /** Serializes one entry; a string second argument is a Nest context, an object is metadata. */
  private format(level: JsonLevel, message: unknown, metaOrContext?: string | LogMeta, extra: LogMeta = {}): string {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : (metaOrContext ?? {});
    const body = message instanceof Error ? { msg: message.message, error: this.normalizeError(message) } : { msg: message };

    return JSON.stringify({ ts: new Date().toISOString(), level, context, ...body, ...extra, ...meta });
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: LogMeta): void;
  log(message: unknown, metaOrContext?: string | LogMeta) {
    super.log(this.format('info', message, metaOrContext));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: LogMeta): void;
  warn(message: unknown, metaOrContext?: string | LogMeta) {
    super.warn(this.format('warn', message, metaOrContext));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: LogMeta): void;
  error(message: unknown, stackOrMeta?: string | LogMeta, maybeContext?: string) {
    if (typeof stackOrMeta === 'string') {
      // Nest's own (message, stack, context) form
      super.error(this.format('error', message, maybeContext, { stack: stackOrMeta }));
      return;
    }
    super.error(this.format('error', message, stackOrMeta));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: LogMeta): void;
  debug(message: unknown, metaOrContext?: string | LogMeta) {
    super.debug(this.format('debug', message, metaOrContext));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: LogMeta): void;
  verbose(message: unknown, metaOrContext?: string | LogMeta) {
    super.verbose(this.format('verbose', message, metaOrContext));
  }

  /** Keeps Nest from downgrading log levels when bufferLogs=true. */
  setLogLevels(levels: LogLevel[]) {
    super.setLogLevels(levels);
  }
}
