import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';
import { Logger } from '../interceptors/logging.interceptor';
import { FieldErrors } from './field-validation.exception';

const PG_UNIQUE_VIOLATION = '23505';

export interface ErrorBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string;
  errors?: FieldErrors;
}

interface PgDriverError {
  code: string;
  detail?: string;
}

function isPgDriverError(value: unknown): value is PgDriverError {
  return typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string';
}

/**
 * Pulls the column list out of a unique-violation detail such as
 * `Key ("rollNumber", "classId")=(7, 5d0c…) already exists.`
 */
export function uniqueViolationFields(detail: string | undefined): string[] {
  const match = /Key \(([^)]*)\)=/.exec(detail ?? '');
  if (!match) return [];
  return match[1]
    .split(',')
    .map((column) => column.trim().replace(/^"|"$/g, ''))
    .filter((column) => column.length > 0);
}

function readMessage(payload: unknown, fallback: string): { message: string; errors?: FieldErrors } {
  if (typeof payload === 'string') return { message: payload };
  if (typeof payload !== 'object' || payload === null) return { message: fallback };

  let message = fallback;
  let errors: FieldErrors | undefined;
  if ('message' in payload) {
    const raw = payload.message;
    if (typeof raw === 'string') message = raw;
    else if (Array.isArray(raw)) message = raw.map(String).join('; ');
  }
  if ('errors' in payload && typeof payload.errors === 'object' && payload.errors !== null) {
    errors = {};
    for (const [field, messages] of Object.entries(payload.errors)) {
      errors[field] = Array.isArray(messages) ? messages.map(String) : [String(messages)];
    }
  }
  return { message, errors };
}

export function toErrorBody(exception: unknown, path: string): ErrorBody {
  const body: ErrorBody = {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    timestamp: new Date().toISOString(),
    path,
    error: 'Internal Server Error',
    message: 'Internal server error',
  };

  if (exception instanceof HttpException) {
    const { message, errors } = readMessage(exception.getResponse(), exception.message);
    body.statusCode = exception.getStatus();
    body.error = exception.name;
    body.message = message;
    if (errors) body.errors = errors;
  } else if (exception instanceof QueryFailedError && isPgDriverError(exception.driverError)
    && exception.driverError.code === PG_UNIQUE_VIOLATION) {
    const fields = uniqueViolationFields(exception.driverError.detail);
    const message = 'A record with these values already exists';
    body.statusCode = HttpStatus.BAD_REQUEST;
    body.error = 'UniqueViolation';
    body.message = message;
    body.errors = Object.fromEntries(fields.map((field) => [field, [message]]));
  } else if (exception instanceof Error) {
    body.error = exception.name;
  }

  return body;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = toErrorBody(exception, request.url);

    const line = `${request.method} ${request.url} ${body.statusCode} - ${body.message}`;
    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      Logger.error(
        line,
        exception instanceof Error ? exception.stack || 'No stack trace available' : String(exception),
        'HttpExceptionFilter',
      );
    } else {
      Logger.warn(line, 'HttpExceptionFilter');
    }

    response.status(body.statusCode).json(body);
  }
}
