import { BadRequestException, ValidationPipe } from '@nestjs/common';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { ValidationError as ClassValidatorError } from 'class-validator';
import { GlobalExceptionFilter } from './filters/exception.filter.js';
import ErrorLoggingInterceptor from './interceptors/error-logging.interceptor.js';
import type { ConfigurationService } from '../config/configuration.js';

export const API_PREFIX = '/api';

/**
 * Pipes, filters and routing shared by the server and its HTTP tests.
 */
export function configureApp(
  app: NestFastifyApplication,
  config: Pick<ConfigurationService, 'isProduction'>
): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: (errors: ClassValidatorError[]) => {
        const validationErrors = errors.reduce<Record<string, string[]>>(
          (acc, err) => {
            if (err.constraints) {
              acc[err.property] = Object.values(err.constraints);
            }
            return acc;
          },
          {}
        );

        return new BadRequestException({
          statusCode: 400,
          message: 'Validation failed',
          errors: validationErrors,
        });
      },
    })
  );

  app.useGlobalFilters(new GlobalExceptionFilter(config));
  app.useGlobalInterceptors(new ErrorLoggingInterceptor());
  app.setGlobalPrefix(API_PREFIX);
}
