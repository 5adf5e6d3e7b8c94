/**
 * Rate-Limit Retry Tests
 */

import {
  computeBackoffDelay,
  isRetryableError,
  withRateLimitRetry,
  ExtractionFatalError,
  ExtractionTransientError,
  type RetryPolicy,
} from '@finstatement/core';
import { rateLimitError } from './fixtures';

const POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 60000, jitterMs: 1000 };
const halfJitter = () => 0.5;

describe('computeBackoffDelay', () => {
  it('should double the base delay per attempt and add jitter', () => {
    expect(computeBackoffDelay(0, POLICY, halfJitter)).toBe(1500);
    expect(computeBackoffDelay(1, POLICY, halfJitter)).toBe(2500);
    expect(computeBackoffDelay(2, POLICY, () => 0)).toBe(4000);
  });

  it('should cap the delay at the maximum', () => {
    expect(computeBackoffDelay(6, POLICY, halfJitter)).toBe(60000);
  });
});

describe('isRetryableError', () => {
  it('should retry rate-limit class failures', () => {
    expect(isRetryableError({ status: 429 })).toBe(true);
    expect(isRetryableError(new Error('Rate limit reached for requests'))).toBe(true);
    expect(isRetryableError(new Error('HTTP 429'))).toBe(true);
    expect(isRetryableError(new Error('too many requests'))).toBe(true);
    expect(isRetryableError(new ExtractionTransientError('slow down'))).toBe(true);
  });

  it('should not retry anything else', () => {
    expect(isRetryableError(new Error('socket hang up'))).toBe(false);
    expect(isRetryableError({ status: 500 })).toBe(false);
    expect(isRetryableError(new ExtractionFatalError('invalid_json', 'status 429 in body'))).toBe(false);
  });
});

describe('withRateLimitRetry', () => {
  it('should return the value of the first successful attempt', async () => {
    const sleep = jest.fn(async () => {});
    let calls = 0;

    const outcome = await withRateLimitRetry(
      async () => {
        calls++;
        if (calls < 3) throw rateLimitError();
        return 'ok';
      },
      POLICY,
      { sleep, random: halfJitter }
    );

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 3, delays: [1500, 2500] });
    expect(sleep.mock.calls).toEqual([[1500], [2500]]);
  });

  it('should escalate to rate_limit_exhausted after the last attempt', async () => {
    const sleep = jest.fn(async () => {});
    const fn = jest.fn(async () => {
      throw rateLimitError();
    });

    const outcome = await withRateLimitRetry(fn, POLICY, { sleep, random: halfJitter });

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.attempts).toBe(3);
      expect(outcome.error.code).toBe('rate_limit_exhausted');
      expect(outcome.error.message).toBe('Rate limit persisted after 3 attempts: Too Many Requests');
    }
  });

  it('should fail fast on non-retryable errors', async () => {
    const sleep = jest.fn(async () => {});
    const fn = jest.fn(async () => {
      throw new Error('socket hang up');
    });

    const outcome = await withRateLimitRetry(fn, POLICY, { sleep });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe('service_error');
      expect(outcome.error.message).toBe('socket hang up');
    }
  });

  it('should keep the code of a fatal extraction error', async () => {
    const outcome = await withRateLimitRetry(
      async () => {
        throw new ExtractionFatalError('schema_violation', 'bad shape');
      },
      POLICY,
      { sleep: async () => {} }
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe('schema_violation');
      expect(outcome.attempts).toBe(1);
    }
  });

  it('should report each scheduled retry', async () => {
    const onRetry = jest.fn();
    await withRateLimitRetry(
      async () => {
        throw rateLimitError();
      },
      { ...POLICY, maxRetries: 2 },
      { sleep: async () => {}, random: () => 0, onRetry }
    );

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 0, delayMs: 1000 }));
  });
});
