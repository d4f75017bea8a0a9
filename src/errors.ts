/**
 * Application error classes
 *
 * Only conditions that stop a source are raised as errors. Missing fields,
 * unmatched keywords and empty feeds are ordinary outcomes and never throw.
 */

export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  GAZETTE_NOT_FOUND = 'GAZETTE_NOT_FOUND',
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  INVALID_PDF = 'INVALID_PDF'
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;
  public readonly original?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    original?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.original = original;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      original: this.original ? { name: this.original.name, message: this.original.message } : undefined
    };
  }
}

/**
 * No gazette was published for any date in the probed range
 */
export class GazetteNotFoundError extends AppError {
  constructor(from: string, to: string) {
    super(`Gazette not found for date range ${from}-${to}`, ErrorCode.GAZETTE_NOT_FOUND, { from, to });
  }
}

/**
 * A network resource or local file could not be read
 */
export class SourceUnavailableError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}, original?: Error) {
    super(message, ErrorCode.SOURCE_UNAVAILABLE, context, original);
  }
}

export class InvalidPdfError extends AppError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.INVALID_PDF, context);
  }
}

/**
 * Normalise any caught value into an AppError
 */
export function toAppError(error: unknown, defaultMessage = 'Unknown error occurred'): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.UNKNOWN, {}, error);
  }

  return new AppError(
    typeof error === 'string' ? error : defaultMessage,
    ErrorCode.UNKNOWN,
    { originalError: error }
  );
}

/**
 * Message of a caught value, for log lines
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
