export { DEFAULT_RETRY_OPTIONS, RetryExecutor, type RetryOptions } from './retry.js';
