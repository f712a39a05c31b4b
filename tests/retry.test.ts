import {
  DEFAULT_RETRY,
  PermanentExternalError,
  TransientExternalError,
  computeBackoff,
  retryBudgetMs,
  withRetry,
  withTimeout,
} from '../src';

describe('computeBackoff', () => {
  test('doubles up to the cap', () => {
    const policy = { ...DEFAULT_RETRY, backoffMs: 200, maxBackoffMs: 1000 };
    expect([0, 1, 2, 3].map((n) => computeBackoff(policy, n))).toEqual([200, 400, 800, 1000]);
  });
});

describe('retryBudgetMs', () => {
  test('adds every timeout and every backoff', () => {
    expect(retryBudgetMs(DEFAULT_RETRY)).toBe(30_600);
    expect(retryBudgetMs({ ...DEFAULT_RETRY, attempts: 1 })).toBe(10_000);
  });
});

describe('withRetry', () => {
  test('retries transient failures then returns the result', async () => {
    const sleep = jest.fn(async () => undefined);
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new TransientExternalError('timeout'))
      .mockRejectedValueOnce(new TransientExternalError('timeout'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, { attempts: 3, backoffMs: 50, sleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[50], [100]]);
  });

  test('does not retry other errors', async () => {
    const sleep = jest.fn(async () => undefined);
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new PermanentExternalError('forbidden'));

    await expect(withRetry(fn, { attempts: 5, sleep })).rejects.toThrow('forbidden');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('throws the last transient error once attempts run out', async () => {
    const sleep = jest.fn(async () => undefined);
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new TransientExternalError('503'));

    await expect(withRetry(fn, { attempts: 3, sleep })).rejects.toThrow(TransientExternalError);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});

describe('withTimeout', () => {
  test('rejects with a transient error when the promise is too slow', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10, 'calendar fetch')).rejects.toThrow(
      'calendar fetch timed out after 10ms'
    );
  });

  test('passes through a prompt result', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
  });
});
