import { ErrorCode } from './error-codes';

export interface PortalErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  originalError?: Error;
  metadata?: Record<string, unknown>;
}

export interface PortalErrorBody {
  error: ErrorCode;
  message: string;
  statusCode: number;
  resource?: string;
  detail?: Record<string, unknown>;
}

export class PortalError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly originalError?: Error;
  readonly metadata?: Record<string, unknown>;

  constructor(options: PortalErrorOptions) {
    super(options.message);
    this.name = 'PortalError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.originalError = options.originalError;
    this.metadata = options.metadata;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Metadata is operator-facing (e.g. missing permission codes) and is only
   * rendered when the caller asks for it.
   */
  toJSON(includeDetail = false): PortalErrorBody {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.httpStatusCode,
      ...(this.resource && { resource: this.resource }),
      ...(includeDetail && this.metadata && { detail: this.metadata }),
    };
  }
}
