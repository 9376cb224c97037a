/**
 * Backoff for idempotent requests. Only failures that `isRetryableError`
 * accepts (network errors, timeouts, 429 and 5xx responses) are retried.
 */
import { logger } from '../core/logger';
import { isRetryableError } from '../core/errors';

export interface RetryOptions {
  /** Attempts after the first one */
  maxRetries: number;
  /** Delay before the first retry in milliseconds, doubled on each further one */
  baseDelay: number;
  /** Cap on a single delay in milliseconds */
  maxDelay?: number;
  /** Spread applied to each delay, between 0 and 1 */
  jitter?: number;
}

const MAX_DELAY_MS = 10000;
const JITTER = 0.3;

/**
 * Delay before retry number `attempt + 1`
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const { baseDelay, maxDelay = MAX_DELAY_MS, jitter = JITTER } = options;
  const delay = Math.min(baseDelay * 2 ** attempt, maxDelay);

  if (jitter <= 0) return delay;
  return Math.floor(delay * (1 - jitter + Math.random() * jitter * 2));
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Runs `fn`, retrying transient failures up to `maxRetries` times.
 * The last error is rethrown once retries run out or a failure is not transient.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryableError(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt, options);
      logger.debug(`Attempt ${attempt + 1}/${options.maxRetries + 1} failed, retrying in ${delay}ms`, {
        error: error instanceof Error ? error.message : String(error)
      });
      await sleep(delay);
    }
  }
}
