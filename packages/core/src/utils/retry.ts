/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { debugLogger } from './debugLogger.js';
import { abortErrorFromSignal } from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay used as +/- jitter (0.3 = +/-30%). */
  jitter: number;
  shouldRetryOnError: (error: Error) => boolean;
  /** Called before each backoff sleep with the 1-based attempt that failed. */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: 0.3,
  shouldRetryOnError: () => true,
};

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(abortErrorFromSignal(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortErrorFromSignal(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Computes the sleep before the next attempt: exponential growth from
 * `initialDelayMs`, capped at `maxDelayMs`, then spread by `jitter`.
 */
export function computeBackoffDelay(
  failedAttempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const base = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * 2 ** (failedAttempt - 1),
  );
  const spread = base * options.jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(base + spread));
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or `maxAttempts`
 * is exhausted. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  if (options?.maxAttempts !== undefined && options.maxAttempts <= 0) {
    throw new Error('maxAttempts must be a positive number.');
  }

  const maxAttempts = options?.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
  const initialDelayMs =
    options?.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const jitter = options?.jitter ?? DEFAULT_RETRY_OPTIONS.jitter;
  const shouldRetryOnError =
    options?.shouldRetryOnError ?? DEFAULT_RETRY_OPTIONS.shouldRetryOnError;
  const onRetry = options?.onRetry;
  const signal = options?.signal;

  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (attempt >= maxAttempts || !shouldRetryOnError(err)) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, {
        initialDelayMs,
        maxDelayMs,
        jitter,
      });
      debugLogger.warn(
        `Attempt ${attempt} failed: ${err.message}. Retrying in ${delayMs}ms...`,
      );
      onRetry?.(attempt, err, delayMs);
      await delay(delayMs, signal);
    }
  }
}
