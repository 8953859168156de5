export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Errors rejected by this predicate are rethrown without further attempts */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delay: number) => void;
  sleep?: (ms: number) => Promise<void>;
  /** Once aborted, no further attempt is made and the last error is thrown */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
};

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;
  let lastError: Error = new Error('retry: no attempt was made');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt === opts.maxRetries) {
        break;
      }
      if (opts.shouldRetry && !opts.shouldRetry(lastError)) {
        break;
      }
      if (opts.signal?.aborted) {
        break;
      }

      const delay = Math.min(opts.baseDelay * Math.pow(opts.backoffFactor, attempt), opts.maxDelay);

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, lastError, delay);
      }

      await wait(delay);

      if (opts.signal?.aborted) {
        break;
      }
    }
  }

  throw lastError;
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
