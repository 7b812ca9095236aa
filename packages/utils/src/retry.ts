/**
 * Retry Logic
 *
 * Bounded retry wrapper. Every caller names its attempt limit; there is no
 * open-ended retry anywhere in the workspace.
 */

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  delayMs: 2000,
  backoffMultiplier: 1,
};

/**
 * Execute a function, retrying on failure up to `maxAttempts` times in total
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let delay = opts.delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxAttempts || (opts.retryIf && !opts.retryIf(error))) {
        throw error;
      }

      opts.onRetry?.(error, attempt);

      await new Promise(resolve => setTimeout(resolve, delay));
      delay *= opts.backoffMultiplier;
    }
  }
}
