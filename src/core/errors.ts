/**
 * Closed error taxonomy for command results.
 *
 * Handlers throw `CommandError`; anything else crossing the engine boundary
 * goes through `toCommandError`, which logs the original and returns a safe
 * replacement whose message never carries driver text.
 */
import type { Logger } from 'pino';
import { classifyStorageError } from '../persistence/storageErrors.js';

export type ErrorCode =
  | 'not_found'
  | 'permission_denied'
  | 'validation_error'
  | 'duplicate_entry'
  | 'invalid_reference'
  | 'constraint_error'
  | 'database_unavailable'
  | 'invalid_input'
  | 'invalid_field'
  | 'internal_error';

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class CommandError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CommandError';
  }

  toPayload(): ErrorPayload {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, details: this.details };
  }
}

export interface FieldErrors {
  field: string;
  messages: string[];
}

export function notFound(resource: string, id?: unknown): CommandError {
  const label = resource.charAt(0).toUpperCase() + resource.slice(1);
  return new CommandError('not_found', id === undefined ? `${label} not found` : `${label} ${String(id)} not found`);
}

export function permissionDenied(action: string, resource: string): CommandError {
  return new CommandError('permission_denied', `Permission denied: cannot ${action} ${resource}`, {
    action,
    resource,
  });
}

export function invalidInput(message: string, details?: Record<string, unknown>): CommandError {
  return new CommandError('invalid_input', message, details);
}

export function invalidField(message: string, details?: Record<string, unknown>): CommandError {
  return new CommandError('invalid_field', message, details);
}

export function validationFailed(errors: FieldErrors[]): CommandError {
  return new CommandError('validation_error', 'Validation failed', {
    errors,
    errorCount: errors.reduce((n, e) => n + e.messages.length, 0),
    fieldsWithErrors: errors.map((e) => e.field),
  });
}

const STORAGE_MESSAGES: Record<ErrorCode, string> = {
  not_found: 'Object not found',
  permission_denied: 'Permission denied',
  validation_error: 'Validation failed',
  duplicate_entry: 'An object with the same unique value already exists',
  invalid_reference: 'A referenced object does not exist or is still referenced',
  constraint_error: 'A database constraint was violated',
  database_unavailable: 'The database is unavailable',
  invalid_input: 'Invalid input provided',
  invalid_field: 'Invalid field specified',
  internal_error: 'An unexpected error occurred',
};

export function toCommandError(err: unknown, logger: Logger, operation: string): CommandError {
  if (err instanceof CommandError) {
    if (err.code === 'not_found' || err.code === 'validation_error') {
      logger.debug({ code: err.code, operation }, err.message);
    } else if (err.code === 'internal_error') {
      logger.error({ code: err.code, operation }, err.message);
    } else {
      logger.warn({ code: err.code, operation }, err.message);
    }
    return err;
  }
  const storageCode = classifyStorageError(err);
  if (storageCode) {
    const log = storageCode === 'internal_error' || storageCode === 'database_unavailable' ? logger.error : logger.warn;
    log.call(logger, { err, code: storageCode, operation }, `Storage error during ${operation}`);
    return new CommandError(storageCode, STORAGE_MESSAGES[storageCode]);
  }
  logger.error({ err, operation }, `Unexpected error during ${operation}`);
  return new CommandError('internal_error', STORAGE_MESSAGES.internal_error);
}
