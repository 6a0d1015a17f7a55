export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  signal?: AbortSignal;
}

/**
 * Runs `fn` with exponential backoff and a little jitter between attempts.
 * Errors rejected by `shouldRetry`, or raised after the signal aborts, are
 * rethrown at once.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 500, maxDelayMs = 5_000, shouldRetry = () => true, signal } = options;

  let attempt = 1;
  const jitter = () => Math.random() * 100;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || signal?.aborted || !shouldRetry(err)) {
        throw err;
      }

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + jitter();
      console.warn(
        `[RETRY] Attempt ${attempt}/${maxAttempts} failed, retrying in ${Math.round(delay)}ms:`,
        err instanceof Error ? err.message : err
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
      attempt += 1;
    }
  }
}
