/**
 * Error categories for the S3-compatible client
 * @module s3-compat-client/errors/categories
 */

import { S3Error, type S3ErrorParams } from './error.js';

type CategoryParams = Omit<S3ErrorParams, 'type' | 'isRetryable'> & {
  isRetryable?: boolean;
};

/**
 * Invalid client configuration: endpoint, bucket/endpoint combination,
 * credentials or transfer settings. Raised before any network call.
 */
export class ConfigurationError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'configuration_error',
      isRetryable: false,
    });
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  static invalidEndpoint(endpoint: string, reason: string): ConfigurationError {
    return new ConfigurationError({
      message: `Invalid endpoint URL '${endpoint}': ${reason}`,
      code: 'INVALID_ENDPOINT',
      details: { endpoint },
    });
  }

  static invalidBucket(bucket: string, endpoint: string, reason: string): ConfigurationError {
    return new ConfigurationError({
      message: `Invalid bucket name '${bucket}' for endpoint URL '${endpoint}': ${reason}`,
      code: 'INVALID_BUCKET',
      details: { bucket, endpoint },
    });
  }

  static invalidSetting(name: string, message: string): ConfigurationError {
    return new ConfigurationError({
      message,
      code: 'INVALID_CONFIG',
      details: { setting: name },
    });
  }

  static missingSetting(name: string, message?: string): ConfigurationError {
    return new ConfigurationError({
      message: message ?? `${name} is required`,
      code: 'MISSING_CONFIG',
      details: { setting: name },
    });
  }
}

/**
 * Malformed input handed to the request signer. A programming error.
 */
export class AuthenticationInputError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'authentication_input_error',
      isRetryable: false,
    });
    this.name = 'AuthenticationInputError';
    Object.setPrototypeOf(this, AuthenticationInputError.prototype);
  }
}

/**
 * Attempt to exceed a hard protocol limit (part numbers, part count)
 */
export class ProtocolLimitError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'protocol_limit_error',
      isRetryable: false,
    });
    this.name = 'ProtocolLimitError';
    Object.setPrototypeOf(this, ProtocolLimitError.prototype);
  }
}

/**
 * Invalid argument passed to an operation (empty key, empty part list, ...)
 */
export class ValidationError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Terminal failure of a multipart transfer. The session has already been
 * aborted (best effort) when this is thrown; `cause` is the first failure.
 */
export class TransferError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'transfer_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'TransferError';
    Object.setPrototypeOf(this, TransferError.prototype);
  }
}

/**
 * Connection-level failure before any HTTP status was received
 */
export class NetworkError extends S3Error {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'TIMEOUT',
      details: { timeoutMs },
    });
  }

  static connectionFailed(message: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `Connection failed: ${message}`,
      code: 'CONNECTION_FAILED',
      cause,
    });
  }

  static aborted(cause?: unknown): NetworkError {
    return new NetworkError({
      message: 'Request was aborted',
      code: 'ABORTED',
      isRetryable: false,
      cause,
    });
  }

  static dnsError(url: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: `DNS resolution failed for ${url}`,
      code: 'DNS_ERROR',
      details: { url },
      cause,
    });
  }
}

/**
 * Non-2xx answer from the storage service
 */
export class RemoteServiceError extends S3Error {
  constructor(params: CategoryParams & { type?: string }) {
    super({
      ...params,
      type: params.type ?? 'remote_service_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'RemoteServiceError';
    Object.setPrototypeOf(this, RemoteServiceError.prototype);
  }
}

export class NotFoundError extends RemoteServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'not_found', isRetryable: false });
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class AccessDeniedError extends RemoteServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'access_denied', isRetryable: false });
    this.name = 'AccessDeniedError';
    Object.setPrototypeOf(this, AccessDeniedError.prototype);
  }
}

export class InvalidRequestError extends RemoteServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'invalid_request', isRetryable: false });
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

/**
 * Any other 4xx answer
 */
export class ClientRequestError extends RemoteServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'client_error' });
    this.name = 'ClientRequestError';
    Object.setPrototypeOf(this, ClientRequestError.prototype);
  }
}

/**
 * 5xx answers and error documents returned with a success status
 */
export class ServerError extends RemoteServiceError {
  constructor(params: CategoryParams) {
    super({ ...params, type: 'server_error', isRetryable: params.isRetryable ?? true });
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}
