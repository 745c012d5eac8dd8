export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 404, 'NOT_FOUND');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class ConfigurationError extends AppError {
  constructor(source: string, message: string) {
    super(`Invalid configuration in '${source}': ${message}`, 500, 'CONFIGURATION_ERROR', false);
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500, 'STORAGE_ERROR', false);
  }
}

export class InboxError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INBOX_ERROR');
  }
}
