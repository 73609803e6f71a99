export interface RetryOptions {
  /** Total number of attempts, including the first one */
  attempts: number;
  /** Only errors accepted here are retried; anything else is rethrown at once */
  retryOn?: (error: unknown) => boolean;
  /** Delay before attempt n (1-based, n >= 2). Defaults to no delay. */
  delayMs?: (attempt: number) => number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const retryable = options.retryOn ? options.retryOn(error) : true;
      if (!retryable || attempt === attempts) break;

      options.onRetry?.(error, attempt);
      const delay = options.delayMs?.(attempt + 1) ?? 0;
      if (delay > 0) await sleep(delay);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
