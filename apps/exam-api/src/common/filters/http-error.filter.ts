import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { DomainException } from '../errors/domain.exception';
import { ERROR_CODES } from '../http/error-codes';
import type { ErrorResponseBody } from '../http/error-response';
import { JsonLogger } from '../../logging/json-logger.service';

type ErrorShape = Pick<ErrorResponseBody, 'statusCode' | 'errorCode' | 'message' | 'details'>;

/**
 * Get a safe, generic error message for a given HTTP status code
 * Prevents leaking framework details in error responses
 */
function safeMessageForStatus(statusCode: number): string {
  if (statusCode === HttpStatus.UNAUTHORIZED) return 'Unauthorized';
  if (statusCode === HttpStatus.FORBIDDEN) return 'Forbidden';
  if (statusCode === HttpStatus.NOT_FOUND) return 'Not Found';
  return 'Internal Server Error';
}

function errorCodeForStatus(statusCode: number): ErrorResponseBody['errorCode'] {
  if (statusCode === HttpStatus.UNAUTHORIZED) return ERROR_CODES.UNAUTHENTICATED;
  if (statusCode === HttpStatus.FORBIDDEN) return ERROR_CODES.FORBIDDEN;
  if (statusCode === HttpStatus.NOT_FOUND) return ERROR_CODES.NOT_FOUND;
  return ERROR_CODES.INTERNAL;
}

/**
 * ValidationPipe puts its field messages in `response.message` as a string array
 */
function validationDetails(exception: BadRequestException): string[] {
  const response = exception.getResponse();
  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.filter((m): m is string => typeof m === 'string');
    if (typeof message === 'string') return [message];
  }
  return [];
}

function shapeOf(exception: unknown): ErrorShape {
  if (exception instanceof DomainException) {
    return { statusCode: exception.getStatus(), errorCode: exception.errorCode, message: exception.message };
  }

  if (exception instanceof BadRequestException) {
    return {
      statusCode: HttpStatus.BAD_REQUEST,
      errorCode: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      details: validationDetails(exception)
    };
  }

  const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
  return { statusCode, errorCode: errorCodeForStatus(statusCode), message: safeMessageForStatus(statusCode) };
}

/**
 * HttpErrorFilter - Global exception filter for consistent error responses
 *
 * Domain failures keep their own errorCode and message. Anything the filter
 * does not recognise is reported by status only, never by its own text.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const shape = shapeOf(exception);
    const body: ErrorResponseBody = {
      ...shape,
      timestamp: new Date().toISOString(),
      path: request.originalUrl ?? request.url,
      requestId: request.requestId
    };

    const meta = {
      requestId: request.requestId,
      method: request.method,
      path: body.path,
      statusCode: body.statusCode,
      errorCode: body.errorCode
    };
    if (body.statusCode >= 500) {
      this.logger.error('Request failed', {
        ...meta,
        stack: exception instanceof Error ? exception.stack : String(exception)
      });
    } else {
      this.logger.warn('Request rejected', meta);
    }

    response.status(body.statusCode).json(body);
  }
}
