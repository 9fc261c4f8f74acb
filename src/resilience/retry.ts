/**
 * Retry with exponential backoff, for callers that want it.
 * Nothing inside the client retries on its own.
 */

import { isRetryableError, S3Error } from '../errors/index.js';
import { errorContext, NoopLogger, type Logger } from '../observability/index.js';

/**
 * Retry options
 */
export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0..1, fraction of the delay added or removed at random */
  jitterFactor: number;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
});

/**
 * Retry executor that handles retryable errors with exponential backoff
 */
export class RetryExecutor {
  private readonly config: RetryOptions;
  private readonly logger: Logger;

  constructor(config: Partial<RetryOptions> = {}, logger: Logger = new NoopLogger()) {
    this.config = { ...DEFAULT_RETRY_OPTIONS, ...config };
    this.logger = logger;
  }

  /**
   * Runs the operation, retrying while it fails with a retryable error and
   * attempts remain. The last error is rethrown as is.
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (!isRetryableError(error) || attempt >= this.config.maxRetries) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        this.logger.warn('Retrying after retryable failure', {
          attempt: attempt + 1,
          maxAttempts: this.config.maxRetries + 1,
          delayMs: delay,
          errorType: error instanceof S3Error ? error.type : 'unknown',
          ...errorContext(error),
        });

        await sleep(delay);
      }
    }
  }

  /**
   * Calculates delay for next retry attempt
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitter = cappedDelay * this.config.jitterFactor * (Math.random() * 2 - 1);
    return Math.max(0, Math.floor(cappedDelay + jitter));
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
