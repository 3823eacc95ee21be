/**
 * Error codes for Prism client errors.
 */
export enum PrismErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  AUTHENTICATION_ERROR = 'AUTHENTICATION_ERROR',

  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_SCHEMA = 'INVALID_SCHEMA',
  MISSING_TARGET = 'MISSING_TARGET',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  NOT_FOUND = 'NOT_FOUND',

  BUCKET_CREATE_FAILED = 'BUCKET_CREATE_FAILED',
  BUCKET_COMPLETE_FAILED = 'BUCKET_COMPLETE_FAILED',

  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',
}

/**
 * Options accepted by the base error.
 */
export interface PrismErrorOptions {
  code: PrismErrorCode;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every error raised by the client.
 */
export class PrismError extends Error {
  readonly code: PrismErrorCode;
  readonly statusCode?: number;
  readonly details?: Record<string, unknown>;

  constructor(options: PrismErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'PrismError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function isPrismError(error: unknown): error is PrismError {
  return error instanceof PrismError;
}
