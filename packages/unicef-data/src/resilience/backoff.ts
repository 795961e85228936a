/**
 * Exponential Backoff Schedule
 *
 * delay(attempt) = initialDelayMs * multiplier ^ (attempt - 1), capped at
 * maxDelayMs, optionally spread by +/- jitterFactor. Pure: the random source
 * is injected and no timer is involved. Sleeping lives in `sleep()` below.
 */

import { FetchCancelledError } from '../core/errors.js';

export interface BackoffPolicy {
  /** Delay before the first retry (default: 1000) */
  readonly initialDelayMs: number;
  /** Exponential multiplier (default: 2) */
  readonly backoffMultiplier: number;
  /** Upper bound on a single delay (default: 30000) */
  readonly maxDelayMs: number;
  /** 0-1. Zero makes the schedule exact (default: 0) */
  readonly jitterFactor: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitterFactor: 0,
};

/**
 * Delay in milliseconds before retry number `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY,
  random: () => number = Math.random
): number {
  if (attempt < 1) {
    return 0;
  }

  const exponentialDelay =
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);

  // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
  const jitterRange = cappedDelay * policy.jitterFactor;
  const jitter = jitterRange === 0 ? 0 : random() * 2 * jitterRange - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
 * Successive retry delays, one per allowed retry
 */
export function* backoffSchedule(
  maxRetries: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY,
  random: () => number = Math.random
): Generator<number, void, undefined> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    yield computeBackoffDelay(attempt, policy, random);
  }
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-backed sleep that rejects with FetchCancelledError on abort
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FetchCancelledError(undefined, { cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new FetchCancelledError(undefined, { cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
