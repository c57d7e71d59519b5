import { ErrorCode } from './error-codes';

export interface ContactBookErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  originalError?: Error;
  metadata?: Record<string, unknown>;
}

export interface ContactBookErrorBody {
  error: ErrorCode;
  message: string;
  statusCode: number;
  resource?: string;
}

export class ContactBookError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(options: ContactBookErrorOptions) {
    super(options.message);
    this.name = 'ContactBookError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.originalError = options.originalError;
    this.metadata = options.metadata;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * True when `error` is a ContactBookError carrying one of `codes`
   */
  static is(error: unknown, ...codes: ErrorCode[]): error is ContactBookError {
    return (
      error instanceof ContactBookError &&
      (codes.length === 0 || codes.includes(error.code))
    );
  }

  toJSON(): ContactBookErrorBody {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.httpStatusCode,
      ...(this.resource && { resource: this.resource }),
    };
  }
}
