export interface RetryOptions {
  /** Total number of attempts, including the first one. */
  attempts: number;
  initialDelayMs: number;
  multiplier?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based): initial * multiplier^(attempt - 1), capped.
 */
export function backoffDelay(attempt: number, initialDelayMs: number, multiplier = 2, maxDelayMs = 30_000): number {
  return Math.min(initialDelayMs * Math.pow(multiplier, Math.max(attempt - 1, 0)), maxDelayMs);
}

/**
 * Runs `operation` until it resolves or the attempt budget is spent, sleeping
 * with exponential backoff in between. The last error is rethrown.
 */
export async function retryWithBackoff<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, initialDelayMs, multiplier = 2, maxDelayMs, shouldRetry = () => true, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts || !shouldRetry(error)) {
        break;
      }
      const delayMs = backoffDelay(attempt, initialDelayMs, multiplier, maxDelayMs);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError;
}
