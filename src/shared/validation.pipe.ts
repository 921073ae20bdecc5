import { ValidationPipe } from '@nestjs/common';
import type { ValidationError } from 'class-validator';
import { ParameterError } from '../messages/errors/messages.errors';
import { formatValidationErrors } from './validation.utils';

/**
 * Global request validation. Failures are raised as ParameterError so they
 * render in the same envelope as the API's own parameter checks.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true, // Strip properties not in DTO
    forbidNonWhitelisted: true, // Reject requests with extra properties
    transform: true, // Transform payloads to DTO instances
    exceptionFactory: (errors: ValidationError[]) =>
      new ParameterError(formatValidationErrors(errors)[0] ?? 'Invalid request parameters'),
  });
}
