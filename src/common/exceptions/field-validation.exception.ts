import { BadRequestException } from '@nestjs/common';

export type FieldErrors = Record<string, string[]>;

/** A 400 that names the offending request field(s). */
export class FieldValidationException extends BadRequestException {
  constructor(field: string | readonly string[], message: string) {
    const fields = typeof field === 'string' ? [field] : field;
    const errors: FieldErrors = {};
    for (const name of fields) {
      errors[name] = [message];
    }
    super({ message, errors });
  }
}
