/**
 * HTTP Client for the SDMX REST API
 *
 * Wraps fetch with:
 * - Exponential backoff on transient failures (408, 429, 5xx, timeout, network)
 * - Per-attempt timeouts via AbortController
 * - Cooperative cancellation through a caller AbortSignal
 *
 * Non-retryable statuses are thrown as HTTPError straight away with the
 * Response attached, so the caller can classify 404 against 400.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 3, timeoutMs: 60000 });
 * const response = await client.fetchWithRetry(url, { signal });
 * const csv = await response.text();
 * ```
 */

import { FetchCancelledError, toError } from './errors.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';
import {
  computeBackoffDelay,
  sleep as timerSleep,
  type BackoffPolicy,
  type SleepFn,
} from '../resilience/backoff.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface HTTPClientConfig extends BackoffPolicy {
  /** Maximum retry attempts after the first try (default: 3) */
  readonly maxRetries: number;

  /** Per-attempt timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  readonly userAgent: string;
}

export interface HTTPClientDeps {
  readonly fetchImpl?: FetchImpl;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
  readonly logger?: Logger;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  /** AbortSignal for external cancellation */
  readonly signal?: AbortSignal;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitterFactor: 0,
  timeoutMs: 60000,
  userAgent: 'unicef-data-ts/0.4.0',
};

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly response?: Response;

  constructor(message: string, statusCode: number, url: string, response?: Response) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.response = response;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection refused, reset, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Every attempt failed with a transient error
 */
export class HTTPRetryExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(url: string, attempts: number, lastError: Error) {
    super(`Retry exhausted after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'HTTPRetryExhaustedError';
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Determine if HTTP status code is retryable
 */
export function isRetryableStatus(status: number): boolean {
  return (
    status === 408 || // Request Timeout
    status === 429 || // Too Many Requests
    status >= 500
  );
}

/**
 * Determine if error is retryable
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return true;
  }
  if (error instanceof HTTPError) {
    return isRetryableStatus(error.statusCode);
  }
  return false;
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  readonly config: HTTPClientConfig;
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(config?: Partial<HTTPClientConfig>, deps: HTTPClientDeps = {}) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
    this.fetchImpl = deps.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? timerSleep;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger ?? rootLogger.child('http');
  }

  /**
   * Fetch raw response with retry logic
   *
   * @throws {HTTPError} Non-retryable status (4xx other than 408/429)
   * @throws {HTTPRetryExhaustedError} Every attempt failed transiently
   * @throws {FetchCancelledError} Caller signal aborted
   */
  async fetchWithRetry(url: string, options: FetchOptions = {}): Promise<Response> {
    const maxRetries = options.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;
    let lastError: Error = new Error('No attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.throwIfCancelled(url, options.signal);

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        lastError = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url,
          response
        );
      } catch (error) {
        lastError = toError(error);
      }

      if (!isRetryableError(lastError)) {
        throw lastError;
      }

      if (attempt === maxAttempts) {
        break;
      }

      const delay = computeBackoffDelay(attempt, this.config, this.random);
      this.logger.warn('HTTP attempt failed, retrying', {
        attempt,
        maxAttempts,
        delayMs: delay,
        error: lastError.message,
        url,
      });
      await this.sleep(delay, options.signal);
    }

    throw new HTTPRetryExhaustedError(url, maxAttempts, lastError);
  }

  /**
   * Fetch with timeout using AbortController
   *
   * The caller's signal is linked for this attempt only; its listener is
   * removed when the attempt settles.
   */
  private async fetchWithTimeout(url: string, options: FetchOptions): Promise<Response> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const caller = options.signal;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    if (caller?.aborted) {
      controller.abort();
    } else {
      caller?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      return await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/csv',
          ...options.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (caller?.aborted) {
        throw new FetchCancelledError(url, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, toError(error));
    } finally {
      clearTimeout(timeoutId);
      caller?.removeEventListener('abort', onCallerAbort);
    }
  }

  private throwIfCancelled(url: string, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new FetchCancelledError(url, { cause: signal.reason });
    }
  }
}
