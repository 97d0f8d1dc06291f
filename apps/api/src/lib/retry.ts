// Bounded retry with exponential backoff, applied explicitly around a single operation.

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  backoffFactor: 2,
};

export interface RetryOptions extends RetryPolicy {
  /** Used in log lines, e.g. "route TKT-1234ABCD". */
  label: string;
  /** Errors for which this returns false are rethrown without further attempts. */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/** Delay before the attempt that follows failed attempt `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt - 1));
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` until it resolves, a non-retryable error is thrown,
 * or `maxAttempts` is reached. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, label, shouldRetry = () => true, sleep = defaultSleep } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay = backoffDelay(options, attempt);
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${reason}. Retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}
