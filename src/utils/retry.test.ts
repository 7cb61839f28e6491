import { describe, expect, it, vi } from 'vitest';

import { withRetry } from './retry';

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

describe('withRetry', () => {
  it('retries with exponential backoff until the call succeeds', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { maxAttempts: 5, initialDelayMs: 100, sleep })).resolves.toBe(
      'ok',
    );
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  it('caps delays at maxDelayMs', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue(new Error('down'));

    await expect(
      withRetry(fn, {
        maxAttempts: 4,
        initialDelayMs: 100,
        backoffMultiplier: 10,
        maxDelayMs: 500,
        sleep,
      }),
    ).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([100, 500, 500]);
  });

  it('stops when shouldRetry declines', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn<() => Promise<never>>().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { maxAttempts: 5, shouldRetry: () => false, sleep }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('reports each retry before waiting', async () => {
    const { sleep } = recordingSleep();
    const onRetry = vi.fn();
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue(1);

    await withRetry(fn, { maxAttempts: 2, initialDelayMs: 50, onRetry, sleep });
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, delayMs: 50 });
  });
});
