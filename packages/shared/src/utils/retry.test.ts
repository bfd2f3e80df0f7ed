import { APICallError } from 'ai';
import { describe, expect, test, vi } from 'vitest';

import {
  abortableSleep,
  computeBackoffDelay,
  isTransientError,
  withRetries,
} from './retry';

function apiError(statusCode?: number): APICallError {
  return new APICallError({
    message: `status ${statusCode ?? 'none'}`,
    url: 'https://api.example.test/v1/chat/completions',
    requestBodyValues: {},
    statusCode,
  });
}

describe('computeBackoffDelay', () => {
  test('doubles per attempt and adds jitter', () => {
    expect(computeBackoffDelay(0, 1000, 500, () => 0)).toBe(1000);
    expect(computeBackoffDelay(1, 1000, 500, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, 1000, 500, () => 0.5)).toBe(8250);
  });

  test('uses defaults of 1000ms base and 500ms jitter', () => {
    expect(computeBackoffDelay(2, undefined, undefined, () => 0.999)).toBe(
      4499,
    );
  });
});

describe('isTransientError', () => {
  test.each([
    [408, true],
    [429, true],
    [500, true],
    [503, true],
    [400, false],
    [401, false],
    [404, false],
  ])('API status %i → %s', (status, expected) => {
    expect(isTransientError(apiError(status))).toBe(expected);
  });

  test('API error without status is a connection failure', () => {
    expect(isTransientError(apiError())).toBe(true);
  });

  test('timeout errors are transient', () => {
    const error = new Error('The operation timed out');
    error.name = 'TimeoutError';

    expect(isTransientError(error)).toBe(true);
  });

  test('socket error codes are found through the cause chain', () => {
    const socketError = Object.assign(new Error('socket closed'), {
      code: 'ECONNRESET',
    });
    const fetchError = new TypeError('fetch failed', { cause: socketError });

    expect(isTransientError(fetchError)).toBe(true);
  });

  test('anything else is permanent', () => {
    expect(isTransientError(new Error('bad request'))).toBe(false);
    expect(isTransientError('boom')).toBe(false);
    expect(isTransientError(null)).toBe(false);
  });
});

describe('abortableSleep', () => {
  test('resolves at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableSleep(60_000, controller.signal)).resolves.toBe(
      undefined,
    );
  });
});

describe('withRetries', () => {
  const noSleep = vi.fn(async () => {});

  test('returns the first success', async () => {
    const operation = vi.fn(async () => 'ok');

    await expect(
      withRetries(operation, { retries: 3, sleep: noSleep }),
    ).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('retries transient failures with backoff', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(apiError(503))
      .mockRejectedValueOnce(apiError(429))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await withRetries(operation, {
      retries: 3,
      random: () => 0,
      sleep,
      onRetry,
    });

    expect(result).toBe('ok');
    expect(operation.mock.calls).toEqual([[0], [1], [2]]);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([1000, 2000]);
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  test('throws the last error after retries are exhausted', async () => {
    const last = apiError(500);
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(apiError(502))
      .mockRejectedValueOnce(last);

    await expect(
      withRetries(operation, { retries: 1, sleep: noSleep }),
    ).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  test('does not retry permanent failures', async () => {
    const error = apiError(400);
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(
      withRetries(operation, { retries: 3, sleep: noSleep }),
    ).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('starts no retry once the signal is aborted', async () => {
    const controller = new AbortController();
    const error = apiError(503);
    const operation = vi.fn(async () => {
      controller.abort();
      throw error;
    });

    await expect(
      withRetries(operation, {
        retries: 3,
        signal: controller.signal,
        sleep: noSleep,
      }),
    ).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test('abort during backoff ends the retry loop', async () => {
    const controller = new AbortController();
    const error = apiError(503);
    const operation = vi.fn(async () => {
      throw error;
    });
    const sleep = vi.fn(async () => {
      controller.abort();
    });

    await expect(
      withRetries(operation, {
        retries: 3,
        signal: controller.signal,
        sleep,
      }),
    ).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  test('honors a custom retry predicate', async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(
      withRetries(operation, {
        retries: 1,
        isRetryable: () => true,
        sleep: noSleep,
      }),
    ).resolves.toBe('ok');
  });
});
