/**
 * Rate-Limit Retry Policy
 *
 * Only rate-limit class failures are retried. The delay before retry n
 * (0-based) is min(base * 2^n + jitter, max), where jitter is uniform in
 * [0, jitterMs). A task makes at most maxRetries calls in total.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { ExtractionFatalError, ExtractionTransientError } from '../errors';

export interface RetryPolicy {
  /** Total attempts allowed, including the first call */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;
export type RandomFn = () => number;

export interface RetryHooks {
  sleep?: SleepFn;
  random?: RandomFn;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number; delays: number[] }
  | { ok: false; error: ExtractionFatalError; attempts: number; delays: number[] };

export const defaultSleep: SleepFn = async (ms) => {
  await delay(ms);
};

const RATE_LIMIT_MARKERS = ['429', 'rate limit', 'too many requests'];

function hasStatus(error: unknown, status: number): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === status;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Rate-limit errors are retryable; everything else is fatal.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExtractionTransientError) return true;
  if (error instanceof ExtractionFatalError) return false;
  if (hasStatus(error, 429)) return true;

  const message = errorMessage(error).toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => message.includes(marker));
}

/**
 * Convert an arbitrary failure into a fatal extraction error.
 */
export function toFatalError(error: unknown): ExtractionFatalError {
  if (error instanceof ExtractionFatalError) return error;
  return new ExtractionFatalError('service_error', errorMessage(error), { cause: error });
}

export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: RandomFn = Math.random
): number {
  const exponential = policy.baseDelayMs * 2 ** attempt;
  return Math.min(exponential + random() * policy.jitterMs, policy.maxDelayMs);
}

/**
 * Run fn, retrying rate-limit failures with exponential backoff.
 * Never throws: the outcome carries either the value or a fatal error.
 */
export async function withRateLimitRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const sleep = hooks.sleep ?? defaultSleep;
  const random = hooks.random ?? Math.random;
  const maxAttempts = Math.max(1, policy.maxRetries);
  const delays: number[] = [];

  for (let attempt = 0; ; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt + 1, delays };
    } catch (error) {
      if (!isRetryableError(error)) {
        return { ok: false, error: toFatalError(error), attempts: attempt + 1, delays };
      }

      if (attempt === maxAttempts - 1) {
        return {
          ok: false,
          error: new ExtractionFatalError(
            'rate_limit_exhausted',
            `Rate limit persisted after ${maxAttempts} attempts: ${errorMessage(error)}`,
            { cause: error }
          ),
          attempts: attempt + 1,
          delays,
        };
      }

      const delayMs = computeBackoffDelay(attempt, policy, random);
      delays.push(delayMs);
      hooks.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}
