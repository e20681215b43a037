import { describe, it, expect, vi } from 'vitest';
import { withRetry } from './retry.js';

function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
}

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn(async () => 'ok');

    await expect(withRetry(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('backs off exponentially between failed attempts', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('reset'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce('third time');

    await expect(withRetry(fn, { sleep })).resolves.toBe('third time');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(delays).toEqual([1000, 2000]);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const fn = async (): Promise<never> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { sleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('caps the delay', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = async (): Promise<never> => {
      throw new Error('down');
    };

    await expect(withRetry(fn, { sleep, maxAttempts: 5 })).rejects.toThrow('down');
    expect(delays).toEqual([1000, 2000, 4000, 8000]);
  });

  it('wraps non-Error rejections', async () => {
    const { sleep } = recordingSleep();
    const fn = () => Promise.reject('plain string');

    await expect(withRetry(fn, { sleep, maxAttempts: 1 })).rejects.toThrow('plain string');
  });
});
