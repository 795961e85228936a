/**
 * Shared test doubles
 *
 * Fetch stand-ins return canned Response objects in call order and record
 * every URL requested. FakeFetcher stands in for the executor, answering
 * per dataflow with a FetchOutcome.
 */

import type { FetchImpl } from '../core/http-client.js';
import { FetchCancelledError } from '../core/errors.js';
import type { FetchOutcome, IndicatorEntry, QuerySpec, RawRecord } from '../core/types.js';
import type { CandidateFetcher, ExecuteOptions } from '../fetch/fetch-executor.js';
import type { FullRecord } from '../normalize/schema.js';
import { Logger } from '../core/utils/logger.js';

export const silentLogger = new Logger({ level: 'silent', service: 'test', pretty: true });

/**
 * SDMX-CSV body from a header row and data rows
 */
export function csvBody(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header.join(','), ...rows.map((row) => row.join(','))].join('\n') + '\n';
}

export function csvResponse(body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, {
    status: 200,
    headers: { 'content-type': 'text/csv', ...headers },
  });
}

export function statusResponse(status: number, body = ''): Response {
  return new Response(body, { status, statusText: `Status ${status}` });
}

export interface RecordingFetch {
  readonly fetchImpl: FetchImpl;
  readonly urls: string[];
}

/**
 * Fetch stand-in answering calls in order; the last responder repeats
 */
export function sequenceFetch(responders: readonly (() => Response | Promise<Response>)[]): RecordingFetch {
  const urls: string[] = [];
  const fetchImpl: FetchImpl = async (input) => {
    const responder = responders[Math.min(urls.length, responders.length - 1)];
    urls.push(input);
    if (!responder) {
      throw new Error('sequenceFetch called without responders');
    }
    return responder();
  };
  return { fetchImpl, urls };
}

/**
 * Fetch stand-in answering by the dataflow id found in the URL
 */
export function routeFetch(routes: Readonly<Record<string, () => Response>>, fallback: () => Response = () => statusResponse(404)): RecordingFetch {
  const urls: string[] = [];
  const fetchImpl: FetchImpl = async (input) => {
    urls.push(input);
    for (const [dataflow, responder] of Object.entries(routes)) {
      if (input.includes(`,${dataflow},`)) {
        return responder();
      }
    }
    return fallback();
  };
  return { fetchImpl, urls };
}

export const noSleep = async (): Promise<void> => {};

/**
 * Indicator entry with verified tier and no disaggregations unless given
 */
export function indicatorEntry(
  code: string,
  directDataflows: readonly string[],
  extra: Partial<Omit<IndicatorEntry, 'code' | 'directDataflows'>> = {}
): IndicatorEntry {
  return {
    code,
    name: extra.name ?? code,
    directDataflows,
    tier: extra.tier ?? 'verified',
    disaggregations: extra.disaggregations ?? [],
    disaggregationsWithTotals: extra.disaggregationsWithTotals ?? [],
    ...(extra.category !== undefined ? { category: extra.category } : {}),
    ...(extra.description !== undefined ? { description: extra.description } : {}),
    ...(extra.tierReason !== undefined ? { tierReason: extra.tierReason } : {}),
  };
}

/**
 * Full-level record with every column null unless given
 */
export function fullRecord(overrides: Partial<FullRecord>): FullRecord {
  const blank: FullRecord = {
    iso3: null,
    country: null,
    period: null,
    geo_type: null,
    indicator: null,
    indicator_name: null,
    value: null,
    unit: null,
    unit_name: null,
    sex: null,
    sex_name: null,
    age: null,
    wealth_quintile: null,
    wealth_quintile_name: null,
    residence: null,
    maternal_edu_lvl: null,
    lower_bound: null,
    upper_bound: null,
    obs_status: null,
    obs_status_name: null,
    data_source: null,
    ref_period: null,
    country_notes: null,
    disability_status: null,
    education_level: null,
    ethnic_group: null,
    time_detail: null,
    current_age: null,
    service_type: null,
    hcf_type: null,
    obs_footnote: null,
    series_footnote: null,
    source_link: null,
    dataflow: null,
  };
  return { ...blank, ...overrides };
}

export interface FetcherCall {
  readonly dataflow: string;
  readonly options: ExecuteOptions | undefined;
}

type OutcomeFn = (dataflow: string, spec: QuerySpec, options?: ExecuteOptions) => Promise<FetchOutcome>;

/**
 * CandidateFetcher answering per dataflow; unlisted dataflows are not-found
 */
export class FakeFetcher implements CandidateFetcher {
  readonly calls: FetcherCall[] = [];

  constructor(private readonly routes: Readonly<Record<string, OutcomeFn>>) {}

  fetch(dataflow: string, spec: QuerySpec, options?: ExecuteOptions): Promise<FetchOutcome> {
    this.calls.push({ dataflow, options });
    const route = this.routes[dataflow];
    if (route) {
      return route(dataflow, spec, options);
    }
    return Promise.resolve({
      kind: 'not-found',
      dataflow,
      url: `https://sdmx.test/data/UNICEF,${dataflow},1.0/`,
      status: 404,
      reason: 'HTTP 404: Not Found',
    });
  }
}

export function succeedWith(rows: readonly RawRecord[]): OutcomeFn {
  return async (dataflow) => ({
    kind: 'success',
    dataflow,
    url: `https://sdmx.test/data/UNICEF,${dataflow},1.0/`,
    rows,
    pages: 1,
  });
}

export function outcome(kind: 'empty' | 'transient-error' | 'fatal-error'): OutcomeFn {
  return async (dataflow) => {
    const url = `https://sdmx.test/data/UNICEF,${dataflow},1.0/`;
    switch (kind) {
      case 'empty':
        return { kind, dataflow, url };
      case 'transient-error':
        return { kind, dataflow, url, cause: new Error('HTTP 503: Service Unavailable'), attempts: 4 };
      case 'fatal-error':
        return { kind, dataflow, url, cause: new Error('HTTP 400: Bad Request'), status: 400 };
    }
  };
}

/**
 * Never settles until the executor signal aborts
 */
export const waitForAbort: OutcomeFn = (_dataflow, _spec, options) =>
  new Promise<FetchOutcome>((_resolve, reject) => {
    const signal = options?.signal;
    if (signal?.aborted) {
      reject(new FetchCancelledError());
      return;
    }
    signal?.addEventListener('abort', () => reject(new FetchCancelledError()), { once: true });
  });
