import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { FieldErrors } from './field-validation.exception';

export function collectFieldErrors(errors: ValidationError[], parent = ''): FieldErrors {
  const result: FieldErrors = {};
  for (const error of errors) {
    const path = parent ? `${parent}.${error.property}` : error.property;
    if (error.constraints) {
      result[path] = Object.values(error.constraints);
    }
    if (error.children && error.children.length > 0) {
      Object.assign(result, collectFieldErrors(error.children, path));
    }
  }
  return result;
}

export function validationExceptionFactory(errors: ValidationError[]): BadRequestException {
  return new BadRequestException({
    message: 'Validation failed',
    errors: collectFieldErrors(errors),
  });
}
