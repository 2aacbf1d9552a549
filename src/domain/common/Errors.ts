/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    const message = id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'CONFIG_ERROR', message, details);
  }
}

/**
 * A sibling shift failed after the record itself was written (500).
 * Shifts already applied are not rolled back.
 */
export class StoreUpdateFailedError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'STORE_UPDATE_FAILED', message, details);
  }
}
