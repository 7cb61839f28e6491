export type RetryOptions = {
  /** Total attempts, including the first call. */
  maxAttempts: number;
  initialDelayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (info: { error: unknown; attempt: number; delayMs: number }) => Promise<void> | void;
  sleep?: (ms: number) => Promise<void>;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calls `fn` until it resolves, waiting `min(initialDelay * multiplier^n, maxDelay)`
 * between attempts. The last error is rethrown once attempts run out or
 * `shouldRetry` declines.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs = 500,
    backoffMultiplier = 2,
    maxDelayMs = 10_000,
    shouldRetry = () => true,
    onRetry,
  } = options;
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delayMs = Math.min(
        initialDelayMs * Math.pow(backoffMultiplier, attempt - 1),
        maxDelayMs,
      );
      await onRetry?.({ error, attempt, delayMs });
      await wait(delayMs);
    }
  }
}
