import { describe, expect, it, vi } from 'vitest';
import { withRetry } from './retry.js';

describe('withRetry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1 })).resolves.toBe('ok');
    expect(fn).toHaveBeenNthCalledWith(1, 1);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it('throws the last error once attempts are exhausted', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 1 })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops when shouldRetry declines', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { maxAttempts: 5, initialDelayMs: 1, shouldRetry: () => false })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error rejections', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue('plain string');

    await expect(withRetry(fn, { maxAttempts: 1 })).rejects.toThrow('plain string');
  });
});
