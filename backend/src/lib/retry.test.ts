import { describe, test, expect, vi } from 'vitest';
import { isTransientHttpError, withRetry } from './retry';

describe('isTransientHttpError', () => {
  test('returns false for null/undefined', () => {
    expect(isTransientHttpError(null)).toBe(false);
    expect(isTransientHttpError(undefined)).toBe(false);
  });

  test('returns false for non-object', () => {
    expect(isTransientHttpError('error')).toBe(false);
    expect(isTransientHttpError(42)).toBe(false);
  });

  test('returns true for 5xx status codes', () => {
    expect(isTransientHttpError({ statusCode: 500 })).toBe(true);
    expect(isTransientHttpError({ statusCode: 502 })).toBe(true);
    expect(isTransientHttpError({ statusCode: 503 })).toBe(true);
  });

  test('returns true for 429 rate limiting', () => {
    expect(isTransientHttpError({ statusCode: 429 })).toBe(true);
  });

  test('returns false for 4xx client errors', () => {
    expect(isTransientHttpError({ statusCode: 400 })).toBe(false);
    expect(isTransientHttpError({ statusCode: 404 })).toBe(false);
  });

  test('returns true for timeouts', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    expect(isTransientHttpError(timeout)).toBe(true);
  });

  test('returns true for network error codes, direct or on cause', () => {
    expect(isTransientHttpError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientHttpError({ code: 'ENOTFOUND' })).toBe(true);
    expect(isTransientHttpError(new TypeError('boom', { cause: { code: 'ECONNREFUSED' } }))).toBe(true);
  });

  test('returns true for fetch failures', () => {
    expect(isTransientHttpError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientHttpError({ message: 'socket hang up' })).toBe(true);
  });

  test('returns false for regular errors', () => {
    expect(isTransientHttpError(new Error('invalid payload'))).toBe(false);
    expect(isTransientHttpError(new SyntaxError('Unexpected token < in JSON'))).toBe(false);
  });
});

describe('withRetry', () => {
  test('returns result on success', async () => {
    const fn = vi.fn(() => Promise.resolve('success'));
    const result = await withRetry(fn, { maxRetries: 3 });
    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('retries on retryable error', async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 3) {
        throw { statusCode: 503 };
      }
      return 'success';
    });

    const result = await withRetry(fn, { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 10 });

    expect(result).toBe('success');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('does not retry on non-retryable error', async () => {
    const fn = vi.fn(async () => {
      throw { statusCode: 404 };
    });

    await expect(withRetry(fn, { maxRetries: 3, initialDelayMs: 1 })).rejects.toEqual({ statusCode: 404 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('throws after max retries exceeded', async () => {
    const fn = vi.fn(async () => {
      throw { statusCode: 500 };
    });

    await expect(withRetry(fn, { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 })).rejects.toEqual({
      statusCode: 500,
    });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('uses custom isRetryable function', async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 2) {
        throw new Error('custom');
      }
      return 'done';
    });

    const result = await withRetry(fn, {
      maxRetries: 2,
      initialDelayMs: 1,
      isRetryable: (error) => error instanceof Error && error.message === 'custom',
    });

    expect(result).toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  test('maxRetries of 0 makes a single attempt', async () => {
    const fn = vi.fn(async () => {
      throw { statusCode: 503 };
    });

    await expect(withRetry(fn, { maxRetries: 0 })).rejects.toEqual({ statusCode: 503 });
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
