/**
 * Retry Policies
 * Backoff configuration used by nodes when an exec attempt fails transiently
 */

export interface RetryPolicy {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds */
  initialDelay: number;
  /** Maximum delay in milliseconds */
  maxDelay: number;
  /** Backoff multiplier (e.g., 2 for exponential backoff) */
  backoffMultiplier: number;
  /** Whether to add jitter to delays */
  jitter?: boolean;
}

/**
 * Rate-limited LLM providers: three attempts, a flat 10s apart
 */
export const LLM_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelay: 10000,
  maxDelay: 10000,
  backoffMultiplier: 1,
  jitter: false,
};

/**
 * Calculate delay after a failed attempt (1-indexed)
 */
export function calculateDelay(policy: RetryPolicy, attempt: number): number {
  const baseDelay = Math.min(
    policy.initialDelay * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelay,
  );

  if (policy.jitter) {
    // ±25%
    const jitterAmount = baseDelay * 0.25;
    return baseDelay + (Math.random() * 2 - 1) * jitterAmount;
  }

  return baseDelay;
}

/**
 * Sleep for `ms` milliseconds. Rejects with the signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
