export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Exponential multiplier in milliseconds */
  baseDelayMs: number;
  /** Lower bound on any wait */
  minDelayMs: number;
  /** Upper bound on any wait */
  maxDelayMs: number;
  /** Extra random delay as a fraction of the exponential term (0-1) */
  jitterFraction: number;
}

/**
 * Wait before retry number `retry` (1 = the wait after the first attempt).
 *
 * Formula: clamp(base * 2^retry + jitter, min, max), jitter drawn from
 * [0, base * 2^retry * jitterFraction). Callers keep the sequence
 * non-decreasing; see RetryGovernor.
 */
export function calculateBackoffDelay(
  retry: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, retry);
  const jitter = exponentialDelay * policy.jitterFraction * random();

  return Math.min(
    policy.maxDelayMs,
    Math.max(policy.minDelayMs, Math.round(exponentialDelay + jitter)),
  );
}
