import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { Observable, catchError, tap, throwError } from 'rxjs';
import { logger } from '@docqa/core';
import { statusFor } from '../filters/exception.filter.js';

/**
 * Logs every request with its duration, and client errors at warn level.
 * Server errors are logged by GlobalExceptionFilter.
 */
@Injectable()
export default class ErrorLoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const label = `${request.method} ${request.url}`;
    const started = Date.now();

    return next.handle().pipe(
      tap(() => logger.debug(`${label} ${Date.now() - started}ms`)),
      catchError((error: unknown) => {
        const status = statusFor(error);
        if (status < 500) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn(`${label} -> ${status}: ${message}`);
        }
        return throwError(() => error);
      })
    );
  }
}
