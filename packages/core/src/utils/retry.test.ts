/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { computeBackoffDelay, retryWithBackoff } from './retry.js';
import { debugLogger } from './debugLogger.js';
import { AbortError } from './errors.js';

// Helper to create a mock function that fails a certain number of times
const createFailingFunction = (
  failures: number,
  successValue: string = 'success',
) => {
  let attempts = 0;
  return vi.fn(async (_attempt: number) => {
    attempts++;
    if (attempts <= failures) {
      throw new Error(`Simulated error attempt ${attempts}`);
    }
    return successValue;
  });
};

// Custom error for testing non-retryable conditions
class NonRetryableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NonRetryableError';
  }
}

describe('retryWithBackoff', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('should return the result on the first attempt if successful', async () => {
    const mockFn = createFailingFunction(0);
    const result = await retryWithBackoff(mockFn);
    expect(result).toBe('success');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should retry and succeed if failures are within maxAttempts', async () => {
    const mockFn = createFailingFunction(2);
    const promise = retryWithBackoff(mockFn, {
      maxAttempts: 3,
      initialDelayMs: 10,
    });

    await vi.runAllTimersAsync();

    const result = await promise;
    expect(result).toBe('success');
    expect(mockFn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('should throw the last error if all attempts fail', async () => {
    const mockFn = createFailingFunction(3);
    const promise = retryWithBackoff(mockFn, {
      maxAttempts: 3,
      initialDelayMs: 10,
    });

    await Promise.all([
      expect(promise).rejects.toThrow('Simulated error attempt 3'),
      vi.runAllTimersAsync(),
    ]);
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should default to 3 maxAttempts if no options are provided', async () => {
    const mockFn = createFailingFunction(10);
    const promise = retryWithBackoff(mockFn);

    await Promise.all([
      expect(promise).rejects.toThrow('Simulated error attempt 3'),
      vi.runAllTimersAsync(),
    ]);
    expect(mockFn).toHaveBeenCalledTimes(3);
  });

  it('should not retry if shouldRetryOnError returns false', async () => {
    const mockFn = vi.fn(async () => {
      throw new NonRetryableError('Non-retryable error');
    });

    const promise = retryWithBackoff(mockFn, {
      shouldRetryOnError: (error) => !(error instanceof NonRetryableError),
      initialDelayMs: 10,
    });

    await expect(promise).rejects.toThrow('Non-retryable error');
    expect(mockFn).toHaveBeenCalledTimes(1);
  });

  it('should throw an error if maxAttempts is not a positive number', async () => {
    const mockFn = createFailingFunction(1);

    await expect(retryWithBackoff(mockFn, { maxAttempts: 0 })).rejects.toThrow(
      'maxAttempts must be a positive number.',
    );
    expect(mockFn).not.toHaveBeenCalled();
  });

  it('should report each retry with its delay', async () => {
    const onRetry = vi.fn();
    const promise = retryWithBackoff(createFailingFunction(2), {
      maxAttempts: 3,
      initialDelayMs: 100,
      jitter: 0,
      onRetry,
    });

    await vi.runAllTimersAsync();
    await promise;

    expect(onRetry.mock.calls.map(([attempt, , delayMs]) => [attempt, delayMs])).toEqual([
      [1, 100],
      [2, 200],
    ]);
  });

  it('should stop waiting with an AbortError when the signal fires', async () => {
    const controller = new AbortController();
    const mockFn = createFailingFunction(10);
    const promise = retryWithBackoff(mockFn, {
      maxAttempts: 5,
      initialDelayMs: 1000,
      jitter: 0,
      signal: controller.signal,
    });

    await vi.advanceTimersByTimeAsync(0);
    controller.abort(new AbortError('resource'));

    await expect(promise).rejects.toMatchObject({
      name: 'AbortError',
      reason: 'resource',
    });
    expect(mockFn).toHaveBeenCalledTimes(1);
  });
});

describe('computeBackoffDelay', () => {
  const options = { initialDelayMs: 1000, maxDelayMs: 30000, jitter: 0.3 };

  it('doubles the delay with each failed attempt', () => {
    const noJitter = { ...options, jitter: 0 };
    expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(attempt, noJitter))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it('caps the delay at maxDelayMs', () => {
    expect(computeBackoffDelay(10, { ...options, jitter: 0 })).toBe(30000);
  });

  it('spreads the delay by the jitter ratio', () => {
    expect(computeBackoffDelay(2, options, () => 0)).toBe(1400);
    expect(computeBackoffDelay(2, options, () => 1)).toBe(2600);
    expect(computeBackoffDelay(2, options, () => 0.5)).toBe(2000);
  });
});
