import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { backoffDelay, withRetry, DEFAULT_RETRY_POLICY } from '../retry';

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 1)).toBe(1000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 2)).toBe(2000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
  });

  it('is capped at the max delay', () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 10)).toBe(60_000);
  });
});

describe('withRetry', () => {
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    sleep.mockClear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first successful result and passes the attempt number', async () => {
    const operation = vi
      .fn(async (attempt: number) => attempt)
      .mockRejectedValueOnce(new Error('first'));

    await expect(withRetry(operation, { ...DEFAULT_RETRY_POLICY, label: 'op', sleep })).resolves.toBe(2);
    expect(sleep.mock.calls).toEqual([[1000]]);
  });

  it('rethrows the last error once attempts run out', async () => {
    let attempts = 0;
    const operation = async () => {
      attempts++;
      throw new Error(`failure ${attempts}`);
    };

    await expect(withRetry(operation, { ...DEFAULT_RETRY_POLICY, label: 'op', sleep })).rejects.toThrow('failure 3');
    expect(attempts).toBe(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('rethrows immediately when shouldRetry declines', async () => {
    let attempts = 0;
    const operation = async () => {
      attempts++;
      throw new TypeError('fatal');
    };

    await expect(
      withRetry(operation, {
        ...DEFAULT_RETRY_POLICY,
        label: 'op',
        sleep,
        shouldRetry: (err) => !(err instanceof TypeError),
      })
    ).rejects.toThrow('fatal');
    expect(attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
