export { PrismError, PrismErrorCode, isPrismError, type PrismErrorOptions } from './error.js';
export {
  ConfigurationError,
  AuthenticationError,
  ValidationError,
  InvalidSchemaError,
  MissingTargetError,
  TableNotFoundError,
  NotFoundError,
  BucketCreateFailedError,
  BucketCompleteFailedError,
  TransportError,
  NetworkError,
  TimeoutError,
  UnexpectedResponseError,
} from './categories.js';
