export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (attempt: number, baseDelayMs: number, maxDelayMs?: number) => {
  const max = maxDelayMs ?? baseDelayMs * 16;
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), max);
};

/** Runs `task`, retrying up to `retries` extra times while `shouldRetry` allows it. */
export const withRetry = async <T>(task: () => Promise<T>, options: RetryOptions): Promise<T> => {
  let attempt = 1;
  for (;;) {
    try {
      return await task();
    } catch (error) {
      if (attempt > options.retries || !options.shouldRetry(error, attempt)) {
        throw error;
      }
      const delay = computeDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
      attempt += 1;
    }
  }
};
