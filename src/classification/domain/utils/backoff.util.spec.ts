import { RetryPolicy, calculateBackoffDelay } from './backoff.util';

describe('calculateBackoffDelay', () => {
  const policy: RetryPolicy = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    minDelayMs: 4000,
    maxDelayMs: 10000,
    jitterFraction: 0,
  };

  it('should clamp to the minimum wait', () => {
    expect(calculateBackoffDelay(1, policy)).toBe(4000);
  });

  it('should grow exponentially between the bounds', () => {
    expect(calculateBackoffDelay(2, policy)).toBe(4000);
    expect(calculateBackoffDelay(3, policy)).toBe(8000);
  });

  it('should clamp to the maximum wait', () => {
    expect(calculateBackoffDelay(4, policy)).toBe(10000);
  });

  it('should add jitter proportional to the exponential term', () => {
    const withJitter = { ...policy, jitterFraction: 0.25 };

    expect(calculateBackoffDelay(2, withJitter, () => 1)).toBe(5000);
    expect(calculateBackoffDelay(3, withJitter, () => 0.5)).toBe(9000);
  });
});
