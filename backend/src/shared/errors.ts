/**
 * shared/errors.ts — Error taxonomy
 *
 * AppError carries an HTTP status and a machine-readable code; the express
 * error handler turns it into the standard `{ success: false, error, code }` body.
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, status: number, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export type DatasetErrorCode = 'DATASET_UNREADABLE' | 'DATASET_SCHEMA' | 'DATASET_EMPTY';

/** Fatal: the listings source cannot produce a working dataset. */
export class DatasetLoadError extends AppError {
  readonly source: string;

  constructor(source: string, code: DatasetErrorCode, message: string, options?: { cause?: unknown }) {
    super(`${message} (source: ${source})`, 503, code);
    this.source = source;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Dataset requested before startup finished loading it. */
export class DatasetNotReadyError extends AppError {
  constructor() {
    super('Dataset is still loading', 503, 'DATASET_NOT_READY');
  }
}

export class ValidationError extends AppError {
  constructor(details: string[]) {
    super('Validation failed', 400, 'VALIDATION_FAILED', details);
  }
}

/** Comparison requested with a selection other than exactly two cities. */
export class InvalidComparisonError extends AppError {
  constructor(message: string, selected: number) {
    super(message, 422, 'INVALID_COMPARISON', { selected });
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
