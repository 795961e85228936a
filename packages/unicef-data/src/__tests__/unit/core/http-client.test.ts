/**
 * HTTP Client Tests
 *
 * Retry classification (408/429/5xx/network retried, other 4xx thrown at
 * once), the backoff delays handed to the injected sleep, and cancellation.
 */

import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import {
  HTTPClient,
  HTTPError,
  HTTPNetworkError,
  HTTPRetryExhaustedError,
  HTTPTimeoutError,
  isRetryableStatus,
} from '../../../core/http-client.js';
import { FetchCancelledError } from '../../../core/errors.js';
import type { FetchImpl } from '../../../core/http-client.js';
import { csvResponse, sequenceFetch, silentLogger, statusResponse } from '../../helpers.js';

const URL = 'https://sdmx.test/data/UNICEF,CME,1.0/.CME_MRY0T4.';

function clientWith(fetchImpl: FetchImpl, delays: number[], maxRetries = 3): HTTPClient {
  return new HTTPClient(
    { maxRetries },
    {
      fetchImpl,
      sleep: async (ms) => {
        delays.push(ms);
      },
      logger: silentLogger,
    }
  );
}

describe('isRetryableStatus', () => {
  it('retries 408, 429 and 5xx only', () => {
    expect(isRetryableStatus(408)).toBe(true);
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(400)).toBe(false);
    expect(isRetryableStatus(404)).toBe(false);
  });
});

describe('HTTPClient.fetchWithRetry', () => {
  it('returns the first 2xx response', async () => {
    const { fetchImpl, urls } = sequenceFetch([() => csvResponse('A\n1\n')]);
    const delays: number[] = [];
    const response = await clientWith(fetchImpl, delays).fetchWithRetry(URL);

    expect(await response.text()).toBe('A\n1\n');
    expect(urls).toEqual([URL]);
    expect(delays).toEqual([]);
  });

  it('retries transient statuses with exponential delays', async () => {
    const { fetchImpl, urls } = sequenceFetch([
      () => statusResponse(503),
      () => statusResponse(429),
      () => csvResponse('A\n1\n'),
    ]);
    const delays: number[] = [];
    const response = await clientWith(fetchImpl, delays).fetchWithRetry(URL);

    expect(response.status).toBe(200);
    expect(urls).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('throws HTTPError without retrying a 400', async () => {
    const { fetchImpl, urls } = sequenceFetch([() => statusResponse(400, 'bad key')]);
    const delays: number[] = [];

    const error = await clientWith(fetchImpl, delays)
      .fetchWithRetry(URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPError);
    expect(error instanceof HTTPError && error.statusCode).toBe(400);
    expect(urls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    const { fetchImpl, urls } = sequenceFetch([() => statusResponse(500)]);
    const delays: number[] = [];

    const error = await clientWith(fetchImpl, delays, 2)
      .fetchWithRetry(URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPRetryExhaustedError);
    expect(error instanceof HTTPRetryExhaustedError && error.attempts).toBe(3);
    expect(urls).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('treats a thrown fetch as a retryable network error', async () => {
    const { fetchImpl, urls } = sequenceFetch([
      () => {
        throw new TypeError('fetch failed');
      },
      () => csvResponse('A\n1\n'),
    ]);
    const delays: number[] = [];
    await clientWith(fetchImpl, delays).fetchWithRetry(URL);

    expect(urls).toHaveLength(2);
    expect(delays).toEqual([1000]);
  });

  it('wraps the last network error when retries run out', async () => {
    const { fetchImpl } = sequenceFetch([
      () => {
        throw new TypeError('ECONNRESET');
      },
    ]);
    const error = await clientWith(fetchImpl, [], 0)
      .fetchWithRetry(URL)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPRetryExhaustedError);
    expect(error instanceof HTTPRetryExhaustedError && error.lastError).toBeInstanceOf(
      HTTPNetworkError
    );
  });

  it('throws FetchCancelledError before calling fetch on an aborted signal', async () => {
    const { fetchImpl, urls } = sequenceFetch([() => csvResponse('A\n1\n')]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      clientWith(fetchImpl, []).fetchWithRetry(URL, { signal: controller.signal })
    ).rejects.toBeInstanceOf(FetchCancelledError);
    expect(urls).toEqual([]);
  });

  it('retries an attempt that times out', async () => {
    const urls: string[] = [];
    const hanging: FetchImpl = (input, init) =>
      new Promise<Response>((_resolve, reject) => {
        urls.push(input);
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    const delays: number[] = [];
    const client = new HTTPClient(
      { maxRetries: 1, timeoutMs: 10 },
      {
        fetchImpl: hanging,
        sleep: async (ms) => {
          delays.push(ms);
        },
        logger: silentLogger,
      }
    );

    const error = await client.fetchWithRetry(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPRetryExhaustedError);
    expect(error instanceof HTTPRetryExhaustedError && error.lastError).toBeInstanceOf(HTTPTimeoutError);
    expect(urls).toEqual([URL, URL]);
    expect(delays).toEqual([1000]);
  });

  it('leaves no abort listeners on the caller signal', async () => {
    const { fetchImpl, urls } = sequenceFetch([() => statusResponse(503)]);
    const controller = new AbortController();

    await expect(
      clientWith(fetchImpl, [], 11).fetchWithRetry(URL, { signal: controller.signal })
    ).rejects.toBeInstanceOf(HTTPRetryExhaustedError);

    expect(urls).toHaveLength(12);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('sends the configured user agent', async () => {
    const seen: string[] = [];
    const fetchImpl: FetchImpl = async (_input, init) => {
      const headers = new Headers(init?.headers);
      seen.push(headers.get('user-agent') ?? '');
      return csvResponse('A\n1\n');
    };
    const client = new HTTPClient({ userAgent: 'unicef-data-test/1.0' }, { fetchImpl, logger: silentLogger });
    await client.fetchWithRetry(URL);

    expect(seen).toEqual(['unicef-data-test/1.0']);
  });
});
