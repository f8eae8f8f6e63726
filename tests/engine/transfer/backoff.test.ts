import { describe, it, expect } from 'vitest';
import { PacingPolicy, RetryPolicy } from '../../../src/engine/transfer/backoff.js';

const policy = new PacingPolicy({
  minDelayMs: 50,
  maxDelayMs: 5000,
  retryThreshold: 3,
  delayMultiplier: 2,
});

describe('PacingPolicy', () => {
  it('should count loss reports below the threshold', () => {
    expect(policy.onResumeRequest({ delayMs: 200, retryCount: 0 }, 4)).toEqual({
      delayMs: 200,
      retryCount: 1,
      escalated: false,
    });
  });

  it('should double the delay and reset the counter at the threshold', () => {
    expect(policy.onResumeRequest({ delayMs: 200, retryCount: 2 }, 1)).toEqual({
      delayMs: 400,
      retryCount: 0,
      escalated: true,
    });
  });

  it('should reset the counter on a report without loss', () => {
    expect(policy.onResumeRequest({ delayMs: 800, retryCount: 2 }, 0)).toEqual({
      delayMs: 800,
      retryCount: 0,
      escalated: false,
    });
  });

  it('should cap the delay at the maximum', () => {
    expect(policy.nextDelay(4000)).toBe(5000);
    const decision = policy.onResumeRequest({ delayMs: 5000, retryCount: 2 }, 1);
    expect(decision).toEqual({ delayMs: 5000, retryCount: 0, escalated: false });
  });

  it('should raise a zero delay to the minimum', () => {
    expect(policy.nextDelay(0)).toBe(50);
  });

  it('should escalate after three consecutive loss reports', () => {
    let state = { delayMs: 200, retryCount: 0 };
    const escalations: boolean[] = [];
    for (let i = 0; i < 6; i++) {
      const decision = policy.onResumeRequest(state, 2);
      escalations.push(decision.escalated);
      state = { delayMs: decision.delayMs, retryCount: decision.retryCount };
    }
    expect(escalations).toEqual([false, false, true, false, false, true]);
    expect(state.delayMs).toBe(800);
  });
});

describe('RetryPolicy', () => {
  it('should be exhausted at maxRetries requests', () => {
    const retries = new RetryPolicy(3);
    expect(retries.isExhausted(0)).toBe(false);
    expect(retries.isExhausted(2)).toBe(false);
    expect(retries.isExhausted(3)).toBe(true);
    expect(retries.isExhausted(4)).toBe(true);
  });
});
