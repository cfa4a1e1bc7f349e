import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { BaseError, ErrorType, logger } from '@docqa/core';
import type { ConfigurationService } from '../../config/configuration.js';

const STATUS_BY_TYPE: Record<ErrorType, HttpStatus> = {
  [ErrorType.CONFIGURATION_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorType.DIMENSION_MISMATCH_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorType.EMPTY_INDEX_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorType.DOCUMENT_NOT_FOUND_ERROR]: HttpStatus.NOT_FOUND,
  [ErrorType.DUPLICATE_DOCUMENT_ERROR]: HttpStatus.CONFLICT,
  [ErrorType.EMBEDDING_UNAVAILABLE_ERROR]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorType.SYNTHESIS_ERROR]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorType.ROLLBACK_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
};

const HttpResponseSchema = z.object({
  message: z.union([z.string(), z.array(z.string())]).optional(),
  errors: z.unknown().optional(),
});

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
  errors?: unknown;
}

export function statusFor(exception: unknown): number {
  if (exception instanceof HttpException) {
    return exception.getStatus();
  }
  if (exception instanceof BaseError) {
    return STATUS_BY_TYPE[exception.type];
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly config: Pick<ConfigurationService, 'isProduction'>
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const reply = http.getResponse<FastifyReply>();
    const request = http.getRequest<FastifyRequest>();

    const body = this.toBody(exception, request.url);
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      logger.error(
        `${request.method} ${request.url} failed: ${body.error}`,
        exception
      );
    }
    void reply.status(body.statusCode).send(body);
  }

  toBody(exception: unknown, path: string): ErrorBody {
    const statusCode = statusFor(exception);
    const base = { statusCode, path, timestamp: new Date().toISOString() };

    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      if (typeof response === 'string') {
        return { ...base, error: exception.name, message: response };
      }
      const parsed = HttpResponseSchema.safeParse(response);
      const { message = exception.message, errors } = parsed.success
        ? parsed.data
        : {};
      return { ...base, error: exception.name, message, errors };
    }

    if (exception instanceof BaseError) {
      const hideDetails =
        statusCode >= HttpStatus.INTERNAL_SERVER_ERROR &&
        this.config.isProduction;
      return {
        ...base,
        error: exception.name,
        message: exception.message,
        metadata: hideDetails ? undefined : exception.metadata,
      };
    }

    return {
      ...base,
      error: 'InternalServerError',
      message: this.config.isProduction
        ? 'Internal server error'
        : exception instanceof Error
          ? exception.message
          : String(exception),
    };
  }
}
