import { InvalidInputError, TransientProviderError } from '../errors';
import { RetryPolicy } from './retry-policy';

describe('RetryPolicy', () => {
  const transient = () => new TransientProviderError('search', 'HTTP 503', 503);

  it('should return the first successful result', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 });
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures until an attempt succeeds', async () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 });
    const operation = jest
      .fn()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    await expect(policy.execute(operation, { onRetry })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation).toHaveBeenLastCalledWith(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the last error once attempts are exhausted', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0 });
    const last = transient();
    const operation = jest.fn().mockRejectedValueOnce(transient()).mockRejectedValueOnce(last);

    await expect(policy.execute(operation)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not retry permanent failures', async () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 0 });
    const operation = jest.fn().mockRejectedValue(new InvalidInputError('bad row'));

    await expect(policy.execute(operation)).rejects.toThrow(InvalidInputError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom retry predicate', async () => {
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0 });
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');

    await expect(policy.execute(operation, { isRetryable: () => true })).resolves.toBe('ok');
  });

  it('should back off exponentially up to the cap', () => {
    const policy = new RetryPolicy({
      baseDelayMs: 100,
      maxDelayMs: 350,
      backoffMultiplier: 2,
      jitter: 0,
    });

    expect([1, 2, 3, 4].map((attempt) => policy.delayFor(attempt))).toEqual([100, 200, 350, 350]);
  });

  it('should add bounded jitter', () => {
    const policy = new RetryPolicy({ baseDelayMs: 1000, maxDelayMs: 60000, jitter: 0.1 });

    for (let i = 0; i < 20; i++) {
      const delay = policy.delayFor(1);
      expect(delay).toBeGreaterThanOrEqual(1000);
      expect(delay).toBeLessThanOrEqual(1100);
    }
  });
});
