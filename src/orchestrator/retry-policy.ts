/**
 * Retry policy for full-graph runs.
 *
 * Backoff is a fixed interval between attempts.
 */
export interface RetryPolicy {
  /** Retry a failed unit before moving on */
  retryFailed: boolean;

  /** Total attempts per unit, including the first one */
  maxRetries: number;

  /** Delay between attempts in milliseconds */
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retryFailed: true,
  maxRetries: 3,
  delayMs: 1000,
};

/**
 * Merge overrides onto a base policy. Attempts are clamped to at least one
 * and the delay to zero or more.
 */
export function buildRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
  base: RetryPolicy = DEFAULT_RETRY_POLICY
): RetryPolicy {
  return {
    retryFailed: overrides.retryFailed ?? base.retryFailed,
    maxRetries: Math.max(1, Math.floor(overrides.maxRetries ?? base.maxRetries)),
    delayMs: Math.max(0, overrides.delayMs ?? base.delayMs),
  };
}

/**
 * Whether a unit that has failed `attempts` times gets another attempt.
 */
export function shouldRetry(attempts: number, policy: RetryPolicy): boolean {
  return policy.retryFailed && attempts < policy.maxRetries;
}
