/**
 * Base error class for the S3-compatible client
 * @module s3-compat-client/errors/error
 */

/**
 * Parameters for creating an S3Error
 */
export interface S3ErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * S3 error code, or a client-side code for local failures
   */
  readonly code?: string;

  /**
   * Whether this error is retryable
   */
  readonly isRetryable: boolean;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying failure, when this error wraps another one
   */
  readonly cause?: unknown;
}

/**
 * Base error class for all client operations
 *
 * Carries enough structure for callers to decide on retry policy:
 * a category, the HTTP status and S3 error code when the service answered,
 * and the request ID to quote to the provider.
 */
export class S3Error extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(params: S3ErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, S3Error.prototype);

    this.name = 'S3Error';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.details = params.details;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, S3Error);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      requestId: this.requestId,
      details: this.details,
      cause: this.cause instanceof S3Error ? this.cause.toJSON() : describeCause(this.cause),
    };
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    const parts = [this.name];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
