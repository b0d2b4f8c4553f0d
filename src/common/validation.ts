import { BadRequestException, ValidationError, ValidationPipe } from '@nestjs/common';

export type FieldErrors = Record<string, string[]>;

export function collectFieldErrors(errors: ValidationError[], parent?: string): FieldErrors {
  return errors.reduce<FieldErrors>((fields, error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});

    if (messages.length > 0) {
      fields[path] = messages;
    }

    return { ...fields, ...collectFieldErrors(error.children ?? [], path) };
  }, {});
}

/**
 * Strips unknown fields (a submitted `id` included) and answers a failed bind
 * with the messages grouped per field, so a form can show them inline.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) =>
      new BadRequestException({
        statusCode: 400,
        error: 'Bad Request',
        message: 'Validation failed',
        errors: collectFieldErrors(errors),
      }),
  });
}
