/**
 * Backoff Schedule Tests
 *
 * Exact delays with jitter disabled, the max-delay cap, jitter bounds
 * through an injected random source, and abortable sleep.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_BACKOFF_POLICY,
  backoffSchedule,
  computeBackoffDelay,
  sleep,
} from '../../../resilience/backoff.js';
import { FetchCancelledError } from '../../../core/errors.js';

describe('computeBackoffDelay', () => {
  it('doubles from the initial delay', () => {
    expect(computeBackoffDelay(1)).toBe(1000);
    expect(computeBackoffDelay(2)).toBe(2000);
    expect(computeBackoffDelay(3)).toBe(4000);
  });

  it('returns 0 before the first retry', () => {
    expect(computeBackoffDelay(0)).toBe(0);
  });

  it('caps at maxDelayMs', () => {
    const policy = { ...DEFAULT_BACKOFF_POLICY, maxDelayMs: 3000 };
    expect(computeBackoffDelay(3, policy)).toBe(3000);
    expect(computeBackoffDelay(10, policy)).toBe(3000);
  });

  it('spreads by the jitter factor in both directions', () => {
    const policy = { ...DEFAULT_BACKOFF_POLICY, jitterFactor: 0.5 };
    expect(computeBackoffDelay(1, policy, () => 0)).toBe(500);
    expect(computeBackoffDelay(1, policy, () => 1)).toBe(1500);
    expect(computeBackoffDelay(1, policy, () => 0.5)).toBe(1000);
  });

  it('does not consult the random source without jitter', () => {
    const random = vi.fn(() => 0.9);
    computeBackoffDelay(2, DEFAULT_BACKOFF_POLICY, random);
    expect(random).not.toHaveBeenCalled();
  });
});

describe('backoffSchedule', () => {
  it('yields one delay per retry', () => {
    expect([...backoffSchedule(3)]).toEqual([1000, 2000, 4000]);
    expect([...backoffSchedule(0)]).toEqual([]);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(250).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(249);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(1000, controller.signal)).rejects.toBeInstanceOf(FetchCancelledError);
  });

  it('rejects when aborted while waiting', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(FetchCancelledError);
  });
});
