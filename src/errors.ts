export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export type IngestionErrorCode = 'malformed_header' | 'invalid_period' | 'missing_identity' | 'persistence_failed';

/**
 * Base class for failures of the workbook ingestion pipeline. `code` is stable
 * and is what API clients see.
 */
export abstract class IngestionError extends Error {
  abstract readonly code: IngestionErrorCode;
}

export class MalformedHeaderError extends IngestionError {
  readonly code = 'malformed_header';
  readonly headerRow: number | null;

  constructor(message: string, headerRow: number | null = null) {
    super(message);
    this.name = 'MalformedHeaderError';
    this.headerRow = headerRow;
  }
}

export class InvalidPeriodError extends IngestionError {
  readonly code = 'invalid_period';
  readonly period: string;

  constructor(period: string) {
    super(`invalid period "${period}", expected YYYY-MM`);
    this.name = 'InvalidPeriodError';
    this.period = period;
  }
}

export class MissingIdentityError extends IngestionError {
  readonly code = 'missing_identity';
  readonly rowNumber: number;

  constructor(rowNumber: number) {
    super(`row ${rowNumber} has data but no customer code`);
    this.name = 'MissingIdentityError';
    this.rowNumber = rowNumber;
  }
}

export class PersistenceError extends IngestionError {
  readonly code = 'persistence_failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}
