/**
 * Fetch Executor
 *
 * Runs one candidate dataflow: builds the query, fetches every page with
 * per-attempt timeout and retry, and classifies the result as a FetchOutcome
 * value. Only caller cancellation is thrown; every other condition comes
 * back as an outcome for the fallback controller to inspect.
 *
 * CLASSIFICATION:
 * - 2xx with rows                     -> success
 * - 2xx without rows / "no results"   -> empty
 * - 404, or an SDMX error body on 2xx -> not-found
 * - 408, 429, 5xx, timeout, network   -> retried, then transient-error
 * - 400 and any other 4xx             -> fatal-error (not retried)
 *
 * PAGINATION:
 * Continuation pages append `startIndex` / `count`. The walk stops when the
 * advertised total is reached, when a page comes back empty or identical to
 * the one before it (upstream sometimes ignores the offset and resends the
 * full set), or, with no total advertised, on a short page. `maxPages` is a
 * hard ceiling that yields a fatal PaginationOverflowError.
 *
 * @module fetch/fetch-executor
 */

import type { PaginationConfig, SdmxEndpointConfig } from '../core/config.js';
import {
  FetchCancelledError,
  PaginationOverflowError,
  toError,
} from '../core/errors.js';
import {
  HTTPError,
  HTTPRetryExhaustedError,
  type HTTPClient,
} from '../core/http-client.js';
import type {
  DataflowSchema,
  FetchOutcome,
  QuerySpec,
  RawRecord,
} from '../core/types.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import { parseCsv } from './csv.js';
import { buildDataUrl, buildSeriesKey, withPage } from './query-builder.js';

export interface FetchExecutorOptions {
  readonly http: HTTPClient;
  readonly endpoint: SdmxEndpointConfig;
  readonly pagination: PaginationConfig;
  readonly logger?: Logger;
}

export interface ExecuteOptions {
  /** Dimension layout of the dataflow; without it the key is `{areas}.{indicator}.` */
  readonly schema?: DataflowSchema;
  /** Dimensions whose `_T` default goes into the key when `spec.totals` is set */
  readonly totalsFor?: readonly string[];
  readonly signal?: AbortSignal;
}

/**
 * Anything the executor can call; the fallback controller depends on this
 */
export interface CandidateFetcher {
  fetch(dataflowId: string, spec: QuerySpec, options?: ExecuteOptions): Promise<FetchOutcome>;
}

type BodyKind = 'csv' | 'no-results' | 'sdmx-error';

const NO_RESULTS_PATTERN = /NoResultsFound|NoRecordsFound|No Results Found|No Records Found/i;
const SDMX_ERROR_PATTERN = /<(?:\w+:)?Error\b|<(?:\w+:)?ErrorMessage\b/;

/**
 * Identify XML error messages returned with a 2xx status
 */
export function classifyBody(text: string): BodyKind {
  const head = text.trimStart();
  if (!head.startsWith('<')) {
    return 'csv';
  }
  if (NO_RESULTS_PATTERN.test(head)) {
    return 'no-results';
  }
  return SDMX_ERROR_PATTERN.test(head) ? 'sdmx-error' : 'csv';
}

/**
 * Total row count advertised by the server, if any
 *
 * Reads `X-Total-Count: 1234` or `Content-Range: items 0-99/1234`.
 */
export function readAdvertisedTotal(headers: Headers): number | null {
  const totalCount = headers.get('x-total-count');
  if (totalCount !== null && /^\d+$/.test(totalCount.trim())) {
    return Number(totalCount.trim());
  }

  const range = headers.get('content-range');
  const match = range ? /\/\s*(\d+)\s*$/.exec(range) : null;
  return match?.[1] ? Number(match[1]) : null;
}

export class FetchExecutor implements CandidateFetcher {
  private readonly http: HTTPClient;
  private readonly endpoint: SdmxEndpointConfig;
  private readonly pagination: PaginationConfig;
  private readonly logger: Logger;

  constructor(options: FetchExecutorOptions) {
    this.http = options.http;
    this.endpoint = options.endpoint;
    this.pagination = options.pagination;
    this.logger = options.logger ?? rootLogger.child('fetch');
  }

  /**
   * Fetch one candidate dataflow
   *
   * @throws {FetchCancelledError} when `options.signal` aborts
   */
  async fetch(
    dataflowId: string,
    spec: QuerySpec,
    options: ExecuteOptions = {}
  ): Promise<FetchOutcome> {
    const { key, droppedFilters } = buildSeriesKey(spec, options.schema, options.totalsFor);
    if (droppedFilters.length > 0) {
      this.logger.debug('Filters not in dataflow schema dropped from key', {
        dataflow: dataflowId,
        dimensions: droppedFilters,
      });
    }

    const url = buildDataUrl(this.endpoint, dataflowId, key, spec.years);
    const { pageSize, maxPages } = this.pagination;
    const rows: RawRecord[] = [];
    let previousBody: string | null = null;
    let pages = 0;

    for (let page = 0; ; page++) {
      if (page >= maxPages) {
        const cause = new PaginationOverflowError(url, maxPages, rows.length);
        this.logger.error('Pagination ceiling reached', { url, maxPages, rows: rows.length });
        return { kind: 'fatal-error', dataflow: dataflowId, url, cause, status: null };
      }

      const pageUrl = page === 0 ? url : withPage(url, rows.length, pageSize);
      this.logger.debug('Requesting page', { dataflow: dataflowId, page, url: pageUrl });

      let response: Response;
      try {
        response = await this.http.fetchWithRetry(pageUrl, { signal: options.signal });
      } catch (error) {
        return this.classifyFailure(dataflowId, url, error);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        if (options.signal?.aborted) {
          throw new FetchCancelledError(pageUrl, { cause: error });
        }
        return { kind: 'transient-error', dataflow: dataflowId, url, cause: toError(error), attempts: 1 };
      }

      const kind = classifyBody(body);

      if (page === 0) {
        if (kind === 'sdmx-error') {
          return {
            kind: 'not-found',
            dataflow: dataflowId,
            url,
            status: null,
            reason: 'SDMX error message in response body',
          };
        }
        if (kind === 'no-results') {
          return { kind: 'empty', dataflow: dataflowId, url };
        }
      } else if (kind !== 'csv' || body === previousBody) {
        if (body === previousBody) {
          this.logger.warn('Duplicate page detected, stopping pagination', {
            dataflow: dataflowId,
            page,
            rows: rows.length,
          });
        }
        break;
      }

      const parsed = parseCsv(body);
      if (parsed.rows.length === 0) {
        if (page === 0) {
          return { kind: 'empty', dataflow: dataflowId, url };
        }
        break;
      }

      for (const row of parsed.rows) {
        rows.push(row);
      }
      previousBody = body;
      pages++;

      const total = readAdvertisedTotal(response.headers);
      if (total !== null ? rows.length >= total : parsed.rows.length < pageSize) {
        break;
      }
    }

    this.logger.debug('Dataflow returned rows', { dataflow: dataflowId, rows: rows.length, pages });
    return { kind: 'success', dataflow: dataflowId, url, rows, pages };
  }

  private async classifyFailure(
    dataflowId: string,
    url: string,
    error: unknown
  ): Promise<FetchOutcome> {
    if (error instanceof FetchCancelledError) {
      throw error;
    }

    if (error instanceof HTTPRetryExhaustedError) {
      this.logger.warn('Retries exhausted', {
        dataflow: dataflowId,
        attempts: error.attempts,
        error: error.lastError.message,
      });
      return {
        kind: 'transient-error',
        dataflow: dataflowId,
        url,
        cause: error,
        attempts: error.attempts,
      };
    }

    if (error instanceof HTTPError) {
      if (error.statusCode === 404) {
        return {
          kind: 'not-found',
          dataflow: dataflowId,
          url,
          status: 404,
          reason: error.message,
        };
      }

      const excerpt = await this.bodyExcerpt(error);
      const cause = new Error(
        `${error.message}${excerpt ? ` - ${excerpt}` : ''}`,
        { cause: error }
      );
      return {
        kind: 'fatal-error',
        dataflow: dataflowId,
        url,
        cause,
        status: error.statusCode,
      };
    }

    return {
      kind: 'transient-error',
      dataflow: dataflowId,
      url,
      cause: toError(error),
      attempts: 1,
    };
  }

  private async bodyExcerpt(error: HTTPError): Promise<string> {
    if (!error.response) {
      return '';
    }
    try {
      const text = await error.response.text();
      return text.replace(/\s+/g, ' ').trim().slice(0, 300);
    } catch (readError) {
      this.logger.debug('Could not read error body', {
        url: error.url,
        error: toError(readError).message,
      });
      return '';
    }
  }
}
