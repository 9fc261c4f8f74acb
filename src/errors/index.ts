/**
 * Error system for the S3-compatible client
 * @module s3-compat-client/errors
 */

export { S3Error, type S3ErrorParams } from './error.js';

export {
  AccessDeniedError,
  AuthenticationInputError,
  ClientRequestError,
  ConfigurationError,
  InvalidRequestError,
  NetworkError,
  NotFoundError,
  ProtocolLimitError,
  RemoteServiceError,
  ServerError,
  TransferError,
  ValidationError,
} from './categories.js';

export { classifyServiceError, isRetryableError, isS3Error } from './mapping.js';
