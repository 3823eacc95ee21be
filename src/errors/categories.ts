import { PrismError, PrismErrorCode } from './error.js';

/**
 * Error thrown when the client is misconfigured (missing credentials, invalid base URL)
 */
export class ConfigurationError extends PrismError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: PrismErrorCode.CONFIGURATION_ERROR,
      message: `Configuration error: ${message}`,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a bearer token cannot be obtained
 */
export class AuthenticationError extends PrismError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super({
      code: PrismErrorCode.AUTHENTICATION_ERROR,
      message,
      statusCode: statusCode ?? 401,
      details,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Error thrown when a request argument is rejected before anything is sent
 */
export class ValidationError extends PrismError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: PrismErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      details,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a schema is absent, unreadable or structurally wrong
 */
export class InvalidSchemaError extends PrismError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super({
      code: PrismErrorCode.INVALID_SCHEMA,
      message: `Invalid schema: ${message}`,
      details,
      cause,
    });
    this.name = 'InvalidSchemaError';
  }
}

/**
 * Error thrown when no target table can be determined for a bucket
 */
export class MissingTargetError extends PrismError {
  constructor(message = 'a table id, table name or schema with an id is required to create a bucket') {
    super({
      code: PrismErrorCode.MISSING_TARGET,
      message,
    });
    this.name = 'MissingTargetError';
  }
}

/**
 * Error thrown when a table referenced by id or name does not exist
 */
export class TableNotFoundError extends PrismError {
  constructor(table: { id?: string; name?: string }) {
    const label = table.id !== undefined ? `ID ${table.id}` : `name ${table.name ?? '<none>'}`;
    super({
      code: PrismErrorCode.TABLE_NOT_FOUND,
      message: `Table ${label} not found`,
      statusCode: 404,
      details: { ...table },
    });
    this.name = 'TableNotFoundError';
  }
}

/**
 * Error thrown when a write addresses a resource id that does not exist
 */
export class NotFoundError extends PrismError {
  constructor(resource: string, id: string) {
    super({
      code: PrismErrorCode.NOT_FOUND,
      message: `${resource} ${id} not found`,
      statusCode: 404,
      details: { resource, id },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the service refuses to create a bucket
 */
export class BucketCreateFailedError extends PrismError {
  constructor(bucketName: string, tableId: string, statusCode: number, body?: unknown) {
    super({
      code: PrismErrorCode.BUCKET_CREATE_FAILED,
      message: `Unable to create bucket ${bucketName} for table ${tableId} (HTTP ${statusCode})`,
      statusCode,
      details: { bucketName, tableId, body },
    });
    this.name = 'BucketCreateFailedError';
  }
}

/**
 * Error thrown when completing a bucket fails with anything but a structured 400
 */
export class BucketCompleteFailedError extends PrismError {
  constructor(bucketId: string, statusCode: number, body?: unknown) {
    super({
      code: PrismErrorCode.BUCKET_COMPLETE_FAILED,
      message: `Unable to complete bucket ${bucketId} (HTTP ${statusCode})`,
      statusCode,
      details: { bucketId, body },
    });
    this.name = 'BucketCompleteFailedError';
  }
}

/**
 * Error thrown when a mutating call returns an unexpected HTTP status
 */
export class TransportError extends PrismError {
  constructor(operation: string, statusCode: number, body?: unknown, details?: Record<string, unknown>) {
    super({
      code: PrismErrorCode.TRANSPORT_ERROR,
      message: `${operation} failed with HTTP ${statusCode}`,
      statusCode,
      details: { ...details, operation, body },
    });
    this.name = 'TransportError';
  }
}

/**
 * Error thrown on connection-level failures (DNS, refused connection, reset)
 */
export class NetworkError extends PrismError {
  constructor(message: string, cause?: unknown) {
    super({
      code: PrismErrorCode.NETWORK_ERROR,
      message,
      cause,
      details: { cause: cause instanceof Error ? cause.message : undefined },
    });
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a request exceeds the configured timeout
 */
export class TimeoutError extends PrismError {
  constructor(timeoutMs: number, url: string) {
    super({
      code: PrismErrorCode.TIMEOUT,
      message: `Request to ${url} timed out after ${timeoutMs}ms`,
      details: { timeoutMs, url },
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when a response body does not have the expected shape
 */
export class UnexpectedResponseError extends PrismError {
  constructor(resource: string, issues: string[]) {
    super({
      code: PrismErrorCode.UNEXPECTED_RESPONSE,
      message: `Unexpected ${resource} payload: ${issues.join('; ')}`,
      details: { resource, issues },
    });
    this.name = 'UnexpectedResponseError';
  }
}
