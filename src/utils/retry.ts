/**
 * Retry helpers with exponential backoff.
 */

export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on each retry */
  baseDelayMs: number;
  /** Upper bound on a single delay */
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay for the given zero-based retry number
 */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs = Number.POSITIVE_INFINITY): number {
  return Math.min(baseDelayMs * Math.pow(2, retry), maxDelayMs);
}

/**
 * Run an operation, retrying failures with exponential backoff.
 * The last error is rethrown once attempts are exhausted.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown = new Error("Operation failed after all retries");

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;

      if (attempt >= options.maxAttempts) break;
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) break;

      const delay = backoffDelay(attempt - 1, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
