export { isRetryableStatus, isTransientError, RETRYABLE_STATUSES } from './error-classifier.js';
export { backoffDelay, type RetryOptions, withRetry } from './retry.js';
