import { AbortError, withRetry } from '../retry';

const FAST = { retries: 2, factor: 1, minTimeout: 0, maxTimeout: 0 };

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, FAST, 'test op')).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured retries', async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(withRetry(operation, FAST, 'test op')).rejects.toThrow('down');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('stops at an AbortError and surfaces the wrapped error', async () => {
    const original = new RangeError('bad request');
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new AbortError(original));

    await expect(withRetry(operation, FAST, 'test op')).rejects.toBe(original);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
