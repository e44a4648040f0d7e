import { backoffDelay, withRetry } from '../retry';
import { Logger } from '../logger';

describe('backoffDelay', () => {
  it('should scale the jitter window by 2^attempt', () => {
    expect(backoffDelay(0, 1000, () => 0.5)).toBe(500);
    expect(backoffDelay(1, 1000, () => 0.5)).toBe(1000);
    expect(backoffDelay(2, 1000, () => 0.5)).toBe(2000);
  });

  it('should stay below the window upper bound', () => {
    expect(backoffDelay(0, 1000, () => 0)).toBe(0);
    expect(backoffDelay(3, 100, () => 0.999)).toBeLessThan(800);
  });
});

describe('withRetry', () => {
  let logger: Logger;
  let sleep: jest.Mock;

  beforeEach(() => {
    logger = new Logger('request', { sink: jest.fn() });
    jest.spyOn(logger, 'warn');
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it('should return the first successful result without sleeping', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, { maxAttempts: 3, baseDelayMs: 100 }, { logger, sleep })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should retry twice then succeed, logging one warning per retried failure', async () => {
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(42);

    const result = await withRetry(operation, { maxAttempts: 3, baseDelayMs: 100 }, {
      logger,
      sleep,
      random: () => 0.5,
    });

    expect(result).toBe(42);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[50], [100]]);
  });

  it('should propagate the last error once the attempts are exhausted', async () => {
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'));

    await expect(
      withRetry(operation, { maxAttempts: 3, baseDelayMs: 100 }, { logger, sleep })
    ).rejects.toThrow('third');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should not retry when a single attempt is allowed', async () => {
    const operation = jest.fn().mockRejectedValue(new Error('boom'));

    await expect(withRetry(operation, { maxAttempts: 1, baseDelayMs: 100 }, { logger, sleep })).rejects.toThrow('boom');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should describe the failure and the delay in the warning', async () => {
    const operation = jest.fn()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    await withRetry(operation, { maxAttempts: 3, baseDelayMs: 100 }, {
      logger,
      sleep,
      random: () => 0.25,
      label: 'GET https://maps.example.test',
    });

    expect(logger.warn).toHaveBeenCalledWith(
      'Attempt 1/3 GET https://maps.example.test failed: boom; retrying in 25ms'
    );
  });

  it('should reject an attempt cap below one', async () => {
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, { maxAttempts: 0, baseDelayMs: 100 })).rejects.toThrow(RangeError);
    expect(operation).not.toHaveBeenCalled();
  });
});
