import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';

const logger = getLogger('resilience-retry');

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Names the operation in retry log lines */
  label?: string;
}

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs `operation` up to `maxAttempts` times. After the n-th failure it waits
 * `baseDelayMs * n` before the next attempt. The last error is rethrown.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_ATTEMPTS);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_DELAY_MS;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts) break;

      const delayMs = baseDelayMs * attempt;
      logger.warn('Operation failed, retrying', {
        operation: options.label,
        attempt,
        maxAttempts,
        delayMs,
        error: serializeError(error),
      });
      await delay(delayMs);
    }
  }

  throw lastError;
}
