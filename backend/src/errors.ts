export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

export function conflict(message: string, details?: unknown): HttpError {
  return new HttpError(409, message, details);
}

export type EtlErrorCode = 'UNSUPPORTED_FORMAT' | 'EMPTY_INPUT' | 'MISSING_COLUMNS' | 'NO_INPUT_FILES';

/** Failure of a whole source file or batch. Row-level problems are never thrown. */
export class EtlError extends Error {
  readonly code: EtlErrorCode;

  constructor(code: EtlErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedFormatError extends EtlError {
  readonly filePath: string;

  constructor(filePath: string) {
    super('UNSUPPORTED_FORMAT', `Unsupported file format: ${filePath}`);
    this.filePath = filePath;
  }
}

export class EmptyInputError extends EtlError {
  constructor() {
    super('EMPTY_INPUT', 'Input table is empty');
  }
}

export class MissingColumnsError extends EtlError {
  readonly columns: string[];

  constructor(columns: string[]) {
    super('MISSING_COLUMNS', `Missing required columns: ${columns.join(', ')}`);
    this.columns = columns;
  }
}

export class NoInputFilesError extends EtlError {
  constructor() {
    super('NO_INPUT_FILES', 'No valid files were processed');
  }
}
