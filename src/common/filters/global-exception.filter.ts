import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { isRecord } from '../json';
import { RateLimitedException } from '../exceptions/rate-limited.exception';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
}

/**
 * Every error leaves as the same JSON envelope.
 * Unexpected errors are logged with their stack and reported as a bare 500.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toBody(exception, request.url);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const detail = exception instanceof Error ? exception.stack ?? exception.message : String(exception);
      this.logger.error(`${request.method} ${request.url} failed: ${detail}`);
    }

    if (exception instanceof RateLimitedException) {
      response.setHeader('Retry-After', String(exception.retryAfterSeconds));
    }

    response.status(body.statusCode).json(body);
  }

  toBody(exception: unknown, path: string): ErrorBody {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'An unexpected error occurred',
        path,
        timestamp,
      };
    }

    const statusCode = exception.getStatus();
    const payload = exception.getResponse();
    let message: string | string[] = exception.message;
    let error = HttpStatus[statusCode] ?? 'Error';

    if (isRecord(payload)) {
      const raw = payload.message;
      if (typeof raw === 'string') message = raw;
      if (Array.isArray(raw)) message = raw.map((m) => String(m));
      if (typeof payload.error === 'string') error = payload.error;
    } else if (typeof payload === 'string') {
      message = payload;
    }

    return { statusCode, error, message, path, timestamp };
  }
}
