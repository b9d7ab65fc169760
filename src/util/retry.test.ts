import { describe, it, expect, vi } from 'vitest';

import { computeDelay, DEFAULT_RETRY_POLICY, exponentialBackoff, NO_RETRY_POLICY } from './retry';

const noWait = async (_ms: number): Promise<void> => undefined;

describe('computeDelay', () => {
  it('doubles from 2s and caps at 10s under the default policy', () => {
    expect([1, 2, 3, 4].map((attempt) => computeDelay(DEFAULT_RETRY_POLICY, attempt))).toEqual([
      2000, 4000, 8000, 10000,
    ]);
  });

  it('keeps jittered delays between half and all of the capped delay', () => {
    const policy = { ...DEFAULT_RETRY_POLICY, jitter: true };

    expect(computeDelay(policy, 1, () => 0)).toBe(1000);
    expect(computeDelay(policy, 1, () => 1)).toBe(2000);
    expect(computeDelay(policy, 5, () => 0.5)).toBe(7500);
  });
});

describe('exponentialBackoff', () => {
  it('resolves once an attempt succeeds', async () => {
    const action = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(exponentialBackoff(action, { ...DEFAULT_RETRY_POLICY, sleep: noWait, onRetry })).resolves.toBe('ok');
    expect(action.mock.calls).toEqual([[1], [2]]);
    expect(onRetry).toHaveBeenCalledWith(new Error('first'), 1, 2000);
  });

  it('rethrows the last error after the final attempt', async () => {
    const action = vi.fn(async () => {
      throw new Error('still down');
    });

    await expect(exponentialBackoff(action, { ...DEFAULT_RETRY_POLICY, sleep: noWait })).rejects.toThrow('still down');
    expect(action).toHaveBeenCalledTimes(3);
  });

  it('stops early when the error is not retryable', async () => {
    const action = vi.fn(async () => {
      throw new Error('bad request');
    });
    const sleep = vi.fn(noWait);

    await expect(
      exponentialBackoff(action, { ...DEFAULT_RETRY_POLICY, sleep, shouldRetry: () => false }),
    ).rejects.toThrow('bad request');
    expect(action).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes a single attempt under the no-retry policy', async () => {
    const action = vi.fn(async () => {
      throw new Error('once');
    });

    await expect(exponentialBackoff(action, { ...NO_RETRY_POLICY })).rejects.toThrow('once');
    expect(action).toHaveBeenCalledTimes(1);
  });
});
