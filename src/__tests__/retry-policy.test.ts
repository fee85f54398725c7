/**
 * RetryPolicy Test Suite
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, delay, isThrottlingError } from '../collector/retry-policy.js';
import { CancelledError, ItemFetchError } from '../shared/errors.js';

function throttlingError(): Error {
  const error = new Error('Rate exceeded');
  error.name = 'ThrottlingException';
  return error;
}

function createPolicy(): { policy: RetryPolicy; sleeps: number[] } {
  const sleeps: number[] = [];
  const policy = new RetryPolicy({
    baseDelayMs: 1,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  });
  return { policy, sleeps };
}

describe('RetryPolicy', () => {
  it('should return the first successful result without sleeping', async () => {
    const { policy, sleeps } = createPolicy();
    const operation = vi.fn(async () => 'ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('should back off exponentially on throttling and then succeed', async () => {
    const { policy, sleeps } = createPolicy();
    let calls = 0;
    const operation = async (): Promise<string> => {
      calls++;
      if (calls <= 3) throw throttlingError();
      return 'done';
    };

    await expect(policy.execute(operation)).resolves.toBe('done');
    expect(calls).toBe(4);
    expect(sleeps).toEqual([1, 2, 4]);
  });

  it('should give up after exactly five attempts when always throttled', async () => {
    const { policy, sleeps } = createPolicy();
    const operation = vi.fn(async (): Promise<string> => {
      throw throttlingError();
    });

    const result = policy.execute(operation, { label: 'Lambda Functions fn-a' });

    await expect(result).rejects.toBeInstanceOf(ItemFetchError);
    await expect(result).rejects.toMatchObject({
      attempts: 5,
      message: 'Lambda Functions fn-a still throttled after 5 attempts: Rate exceeded',
    });
    expect(operation).toHaveBeenCalledTimes(5);
    expect(sleeps).toEqual([1, 2, 4, 8]);
  });

  it('should pass the zero-based attempt number to the operation', async () => {
    const { policy } = createPolicy();
    const seen: number[] = [];

    await policy.execute(async attempt => {
      seen.push(attempt);
      if (attempt < 2) throw throttlingError();
      return attempt;
    });

    expect(seen).toEqual([0, 1, 2]);
  });

  it('should fail immediately on a non-throttling error', async () => {
    const { policy, sleeps } = createPolicy();
    const cause = new Error('AccessDenied');
    const operation = vi.fn(async (): Promise<string> => {
      throw cause;
    });

    const result = policy.execute(operation, { label: 'stack prod' });

    await expect(result).rejects.toMatchObject({ attempts: 1, message: 'stack prod failed: AccessDenied', cause });
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('should honour a custom retry predicate and attempt count', async () => {
    const policy = new RetryPolicy({
      maxAttempts: 2,
      baseDelayMs: 1,
      isRetryable: () => true,
      sleep: async () => undefined,
    });
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error('flaky');
    });

    await expect(policy.execute(operation)).rejects.toMatchObject({ attempts: 2 });
    expect(operation).toHaveBeenCalledTimes(2);
    expect(policy.maxAttempts).toBe(2);
  });

  it('should not start when the signal is already aborted', async () => {
    const { policy } = createPolicy();
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(policy.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop retrying once the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const policy = new RetryPolicy({
      baseDelayMs: 1,
      sleep: async () => {
        controller.abort();
      },
    });
    const operation = vi.fn(async (): Promise<string> => {
      throw throttlingError();
    });

    await expect(policy.execute(operation, { signal: controller.signal, label: 'job' })).rejects.toThrow('job cancelled');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should reject an attempt count below one', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });
});

describe('isThrottlingError', () => {
  it('should recognise SDK throttling names and codes', () => {
    expect(isThrottlingError(throttlingError())).toBe(true);
    expect(isThrottlingError({ name: 'TooManyRequestsException' })).toBe(true);
    expect(isThrottlingError({ Code: 'RequestLimitExceeded' })).toBe(true);
  });

  it('should recognise HTTP 429 responses', () => {
    expect(isThrottlingError({ name: 'UnknownError', $metadata: { httpStatusCode: 429 } })).toBe(true);
  });

  it('should recognise the rate exceeded message', () => {
    expect(isThrottlingError(new Error('Rate exceeded for operation'))).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isThrottlingError(new Error('AccessDenied'))).toBe(false);
    expect(isThrottlingError({ $metadata: { httpStatusCode: 500 } })).toBe(false);
    expect(isThrottlingError('Rate exceeded')).toBe(false);
    expect(isThrottlingError(null)).toBe(false);
  });
});

describe('delay', () => {
  it('should resolve after the given time', async () => {
    await expect(delay(1)).resolves.toBeUndefined();
  });

  it('should reject with CancelledError when aborted', async () => {
    const controller = new AbortController();
    const pending = delay(60_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
