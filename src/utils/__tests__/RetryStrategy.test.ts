import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { executeWithRetry, isRetryable, RetryOptions } from '../RetryStrategy.js';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('executeWithRetry', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should succeed on first attempt', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockResolvedValue('success');

    const result = await executeWithRetry(mockFn);

    expect(result).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should retry on retryable errors and eventually succeed', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'))
      .mockRejectedValueOnce(new Error('the database system is starting up'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, { initialDelayMs: 100 });

    await jest.advanceTimersByTimeAsync(100);
    await jest.advanceTimersByTimeAsync(200);

    const result = await promise;

    expect(result).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should not retry on non-retryable errors', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('password authentication failed for user "app"'));

    await expect(executeWithRetry(mockFn)).rejects.toThrow('password authentication failed');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should throw after max retries exceeded', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('Connection timeout'));

    const options: RetryOptions = {
      maxRetries: 2,
      initialDelayMs: 100,
    };

    const promise = executeWithRetry(mockFn, options);

    // Race the timer advances so the rejection is observed before it goes unhandled
    const resultPromise = Promise.race([
      promise.catch((err) => ({ error: err })),
      (async () => {
        await jest.advanceTimersByTimeAsync(100);
        await jest.advanceTimersByTimeAsync(200);
        await jest.runOnlyPendingTimersAsync();
      })(),
    ]);

    await resultPromise;

    await expect(promise).rejects.toThrow('Connection timeout');
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should apply exponential backoff correctly', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, { initialDelayMs: 100, backoffMultiplier: 2 });

    await jest.advanceTimersByTimeAsync(100);
    expect(mockFn).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(200);
    expect(mockFn).toHaveBeenCalledTimes(3);

    await expect(promise).resolves.toBe('success');
  });

  it('should maintain maxDelayMs cap across multiple retries', async () => {
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValue('success');

    const options: RetryOptions = {
      initialDelayMs: 500,
      backoffMultiplier: 4,
      maxDelayMs: 1000,
    };

    const promise = executeWithRetry(mockFn, options);

    await jest.advanceTimersByTimeAsync(500);
    expect(mockFn).toHaveBeenCalledTimes(2);

    // 2000ms uncapped
    await jest.advanceTimersByTimeAsync(1000);
    expect(mockFn).toHaveBeenCalledTimes(3);

    await jest.advanceTimersByTimeAsync(1000);
    expect(mockFn).toHaveBeenCalledTimes(4);

    await expect(promise).resolves.toBe('success');
  });

  it('should report each retry through onRetry', async () => {
    const onRetry = jest.fn<(attempt: number, delayMs: number, error: Error) => void>();
    const mockFn = jest
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('Connection terminated unexpectedly'))
      .mockResolvedValue('success');

    const promise = executeWithRetry(mockFn, { initialDelayMs: 250, onRetry });

    await jest.advanceTimersByTimeAsync(250);
    await jest.advanceTimersByTimeAsync(500);
    await promise;

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][1]).toBe(250);
    expect(onRetry.mock.calls[1][0]).toBe(2);
    expect(onRetry.mock.calls[1][1]).toBe(500);
    expect(onRetry.mock.calls[1][2].message).toBe('Connection terminated unexpectedly');
  });

  it('should normalize non-Error rejections', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockRejectedValue('string error');

    await expect(executeWithRetry(mockFn)).rejects.toThrow('string error');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should respect maxRetries: 0 (no retries, only initial attempt)', async () => {
    const mockFn = jest.fn<() => Promise<string>>().mockRejectedValue(new Error('timeout'));

    await expect(executeWithRetry(mockFn, { maxRetries: 0, initialDelayMs: 50 })).rejects.toThrow(
      'timeout'
    );

    await jest.advanceTimersByTimeAsync(1000);
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should preserve original error instance', async () => {
    const originalError = new Error('relation "entities" does not exist');
    const mockFn = jest.fn<() => Promise<string>>().mockRejectedValue(originalError);

    await expect(executeWithRetry(mockFn)).rejects.toBe(originalError);
  });
});

describe('isRetryable', () => {
  it('should match transient connection messages case-insensitively', () => {
    const messages = [
      'CONNECT ECONNREFUSED 127.0.0.1:5432',
      'getaddrinfo ENOTFOUND db',
      'read ECONNRESET',
      'Connection terminated due to connection timeout',
      'sorry, too many clients already',
    ];

    for (const message of messages) {
      expect(isRetryable(new Error(message))).toBe(true);
    }
  });

  it('should match PostgreSQL startup and capacity codes', () => {
    expect(isRetryable(pgError('cannot connect now', '57P03'))).toBe(true);
    expect(isRetryable(pgError('no more connections', '53300'))).toBe(true);
  });

  it('should reject other PostgreSQL errors', () => {
    expect(isRetryable(pgError('syntax error at or near "SELEC"', '42601'))).toBe(false);
    expect(isRetryable(pgError('relation "entities" does not exist', '42P01'))).toBe(false);
  });

  it('should reject values that are not errors', () => {
    expect(isRetryable('timeout')).toBe(false);
    expect(isRetryable(undefined)).toBe(false);
  });
});
