/**
 * Application Errors
 * ==================
 *
 * Every failure the analyzer raises on purpose is an AppError: a stable
 * machine code, a message and the HTTP status the API answers with.
 * Numeric undefined-ness (NaN) is never turned into one of these.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class DatasetLoadError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DATASET_LOAD_FAILED', message, 500);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class ColumnNotFoundError extends AppError {
  readonly column: string;

  constructor(column: string, reason = 'unknown column') {
    super('COLUMN_NOT_FOUND', `Column "${column}" not found: ${reason}`, 404);
    this.column = column;
  }
}

export class EntityNotFoundError extends AppError {
  readonly entity: string;

  constructor(entity: string) {
    super('ENTITY_NOT_FOUND', `Entity "${entity}" not found`, 404);
    this.entity = entity;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}
