import { ValidationError as ClassValidatorError, ValidationPipe } from '@nestjs/common';
import { ValidationError } from './errors';

/** Nested violations are prefixed with the path of the object holding them. */
function flatten(errors: ClassValidatorError[], parent?: string): string[] {
  return errors.flatMap(error => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(message => (parent ? `${parent}.${message}` : message));
    return [...own, ...flatten(error.children ?? [], path)];
  });
}

export function validationExceptionFactory(errors: ClassValidatorError[]): ValidationError {
  const violations = flatten(errors);
  return new ValidationError(violations[0] ?? 'Invalid request', violations);
}

/** The pipe every HTTP entry point uses: DTO transform plus domain ValidationError. */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    exceptionFactory: validationExceptionFactory,
  });
}
