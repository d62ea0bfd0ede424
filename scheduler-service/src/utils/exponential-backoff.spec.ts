import { ExponentialBackoff, cappedExponentialDelay, withExponentialBackoff } from './exponential-backoff';

describe('cappedExponentialDelay', () => {
  it('doubles from the initial delay and stops at the cap', () => {
    expect(cappedExponentialDelay(0, 1000, 2, 30000)).toBe(1000);
    expect(cappedExponentialDelay(3, 1000, 2, 30000)).toBe(8000);
    expect(cappedExponentialDelay(10, 1000, 2, 30000)).toBe(30000);
  });

  it('treats negative attempts as the first one', () => {
    expect(cappedExponentialDelay(-1, 1000, 2, 30000)).toBe(1000);
  });
});

describe('ExponentialBackoff', () => {
  it('adds proportional jitter on top of the capped delay', () => {
    const backoff = new ExponentialBackoff({ random: { next: () => 0.5 }, jitterFactor: 0.1 });

    expect(backoff.calculateDelay(2)).toBe(4200);
  });

  it('retries until the operation succeeds', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    const result = await withExponentialBackoff(operation, { sleep, random: { next: () => 0 } }, 'flaky');

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('stops as soon as shouldRetry declines', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    const operation = jest.fn<Promise<void>, []>().mockRejectedValue(new Error('ACCESS_REFUSED'));

    await expect(
      withExponentialBackoff(operation, { sleep, shouldRetry: () => false }),
    ).rejects.toThrow('ACCESS_REFUSED');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('rethrows the last error once retries run out', async () => {
    const sleep = jest.fn().mockResolvedValue(undefined);
    let calls = 0;
    const operation = async (): Promise<void> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withExponentialBackoff(operation, { maxRetries: 2, sleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
