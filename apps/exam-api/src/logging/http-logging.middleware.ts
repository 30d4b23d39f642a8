import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { JsonLogger } from './json-logger.service';

function safePath(req: Request): string {
  // Avoid logging query strings; keep just the path.
  return req.originalUrl?.split('?')[0] ?? req.url ?? '';
}

/**
 * Assigns a correlation id (x-request-id, echoed back) and logs one line per
 * finished request: 5xx as error, 4xx as warn, otherwise info.
 */
export function createHttpLoggingMiddleware(logger: JsonLogger) {
  return function httpLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();

    const incomingId = req.header('x-request-id');
    const requestId = incomingId && incomingId.trim().length > 0 ? incomingId.trim() : randomUUID();
    req.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      const meta: Record<string, unknown> = {
        requestId,
        method: req.method,
        path: safePath(req),
        statusCode: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10
      };

      if (req.user) {
        meta.userId = req.user.userId;
        meta.userRole = req.user.role;
      }

      if (res.statusCode >= 500) {
        logger.error('HTTP request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('HTTP request client error', meta);
      } else {
        logger.log('HTTP request', meta);
      }
    });

    next();
  };
}
