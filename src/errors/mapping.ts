/**
 * Response classification and error helpers
 * @module s3-compat-client/errors/mapping
 */

import { S3Error } from './error.js';
import {
  AccessDeniedError,
  ClientRequestError,
  InvalidRequestError,
  NotFoundError,
  RemoteServiceError,
  ServerError,
} from './categories.js';

const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NoSuchBucket', 'NoSuchUpload']);

// 4xx answers that a later attempt can succeed on
const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);
const RETRYABLE_CODES = new Set(['SlowDown', 'RequestTimeout', 'RequestTimeTooSkewed']);

/**
 * Classifies a failed service response.
 *
 * Precedence: not-found (404 or a NoSuch* code), access-denied (403 or
 * AccessDenied), invalid-request (InvalidRequest code), any other 4xx,
 * then server error.
 */
export function classifyServiceError(
  status: number,
  code?: string,
  message?: string,
  requestId?: string,
  details?: Record<string, unknown>
): RemoteServiceError {
  const params = {
    message: message || defaultMessageForStatus(status),
    status,
    code,
    requestId,
    details,
  };

  if (status === 404 || (code !== undefined && NOT_FOUND_CODES.has(code))) {
    return new NotFoundError(params);
  }

  if (status === 403 || code === 'AccessDenied') {
    return new AccessDeniedError(params);
  }

  if (code === 'InvalidRequest') {
    return new InvalidRequestError(params);
  }

  const retryable =
    RETRYABLE_CLIENT_STATUSES.has(status) || (code !== undefined && RETRYABLE_CODES.has(code));

  if (status >= 400 && status < 500) {
    return new ClientRequestError({ ...params, isRetryable: retryable });
  }

  return new ServerError(params);
}

/**
 * Checks if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof S3Error) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Type guard for errors raised by this library
 */
export function isS3Error(error: unknown): error is S3Error {
  return error instanceof S3Error;
}

function defaultMessageForStatus(status: number): string {
  switch (status) {
    case 400:
      return 'Bad Request';
    case 403:
      return 'Access denied';
    case 404:
      return 'The specified resource was not found';
    case 409:
      return 'Conflict';
    case 412:
      return 'Precondition Failed';
    case 429:
      return 'Too Many Requests';
    case 500:
      return 'Internal Server Error';
    case 503:
      return 'Service Unavailable';
    default:
      return `HTTP ${status}`;
  }
}
