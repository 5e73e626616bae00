/**
 * Error taxonomy for the contact manager.
 *
 * Only ConfigurationError is expected to escape to the process boundary.
 * The others are caught by the operation that raised them, logged, and
 * turned into a benign return value (null id, zero rows, empty list).
 */

export class ContactManagerError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'ContactManagerError';
  }
}

export class ConfigurationError extends ContactManagerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends ContactManagerError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason = 'Invalid input') {
    super(`${reason} for ${field}: ${JSON.stringify(value)}`);
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

export class StorageError extends ContactManagerError {
  public readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(`Storage operation "${operation}" failed`, cause);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class ExternalServiceError extends ContactManagerError {
  public readonly service: string;
  public readonly status: string;
  public readonly isRetryable: boolean;
  public readonly httpStatus?: number;

  constructor(
    message: string,
    service: string,
    status: string,
    isRetryable = false,
    httpStatus?: number,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.status = status;
    this.isRetryable = isRetryable;
    this.httpStatus = httpStatus;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
