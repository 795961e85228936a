/**
 * Fallback Controller Tests
 *
 * Candidate walk order, outcome handling per kind, the error raised when
 * every candidate is rejected, the aggregate deadline and cancellation.
 */

import { describe, it, expect } from 'vitest';
import { FallbackController } from '../../../fallback/fallback-controller.js';
import { MetadataStore } from '../../../metadata/store.js';
import { DEFAULT_FALLBACK_SEQUENCES } from '../../../metadata/defaults.js';
import { buildQuerySpec } from '../../../fetch/query-builder.js';
import {
  DeadlineExceededError,
  FatalQueryError,
  FetchCancelledError,
  NotFoundAllCandidatesError,
  PaginationOverflowError,
  TransientExhaustedError,
} from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import { FetchExecutor } from '../../../fetch/fetch-executor.js';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import type { RawRecord } from '../../../core/types.js';
import {
  FakeFetcher,
  csvBody,
  csvResponse,
  indicatorEntry,
  noSleep,
  sequenceFetch,
  outcome,
  silentLogger,
  succeedWith,
  waitForAbort,
} from '../../helpers.js';

const store = MetadataStore.create({
  indicators: [
    indicatorEntry('CME_MRY0T4', ['CME'], { disaggregationsWithTotals: ['SEX'] }),
    indicatorEntry('PT_CHLD_Y0T4_REG', ['PT', 'CHILD_PROTECTION']),
  ],
  fallbackSequences: DEFAULT_FALLBACK_SEQUENCES,
  dataflows: [
    {
      id: 'CME',
      agency: 'UNICEF',
      version: '1.0',
      dimensions: [
        { id: 'REF_AREA', position: 1 },
        { id: 'INDICATOR', position: 2 },
        { id: 'SEX', position: 3 },
      ],
      timeDimension: 'TIME_PERIOD',
      primaryMeasure: 'OBS_VALUE',
      attributes: [],
    },
  ],
  countries: { BRA: 'Brazil' },
});

const ROWS: RawRecord[] = [
  { REF_AREA: 'BRA', INDICATOR: 'CME_MRY0T4', SEX: '_T', TIME_PERIOD: '2020', OBS_VALUE: '14.2' },
  { REF_AREA: 'BRA', INDICATOR: 'CME_MRY0T4', SEX: 'M', TIME_PERIOD: '2020', OBS_VALUE: '15.3' },
];

const spec = buildQuerySpec({ indicatorCode: 'CME_MRY0T4', countries: ['BRA'] });

function controllerFor(fetcher: FakeFetcher): FallbackController {
  return new FallbackController({ executor: fetcher, logger: silentLogger });
}

describe('FallbackController.fetchWithFallback', () => {
  it('stops at the first candidate that succeeds', async () => {
    const fetcher = new FakeFetcher({ CME: succeedWith(ROWS) });
    const result = await controllerFor(fetcher).fetchWithFallback(spec, { store, level: 'minimal' });

    expect(result.dataflow).toBe('CME');
    expect(result.tier).toBe('direct');
    expect(result.tried).toEqual(['CME']);
    expect(result.attempts).toEqual([]);
    expect(result.rawRows).toBe(2);
    expect(result.records).toEqual([
      { iso3: 'BRA', country: 'Brazil', indicator: 'CME_MRY0T4', period: 2020, value: 14.2 },
    ]);
    expect(fetcher.calls.map((call) => call.dataflow)).toEqual(['CME']);
  });

  it('passes the dataflow schema, total dimensions and a signal to the executor', async () => {
    const fetcher = new FakeFetcher({ CME: succeedWith(ROWS) });
    await controllerFor(fetcher).fetchWithFallback(spec, { store, level: 'minimal' });

    const options = fetcher.calls[0]?.options;
    expect(options?.schema?.id).toBe('CME');
    expect(options?.totalsFor).toEqual(['SEX']);
    expect(options?.signal).toBeInstanceOf(AbortSignal);
  });

  it('moves past empty and not-found candidates in order', async () => {
    const fetcher = new FakeFetcher({
      PT: outcome('empty'),
      GLOBAL_DATAFLOW: succeedWith([
        { REF_AREA: 'BRA', INDICATOR: 'PT_CHLD_Y0T4_REG', TIME_PERIOD: '2019', OBS_VALUE: '96' },
      ]),
    });
    const result = await controllerFor(fetcher).fetchWithFallback(
      buildQuerySpec({ indicatorCode: 'PT_CHLD_Y0T4_REG' }),
      { store, level: 'minimal' }
    );

    expect(result.dataflow).toBe('GLOBAL_DATAFLOW');
    expect(result.tried).toEqual(['PT', 'CHILD_PROTECTION', 'GLOBAL_DATAFLOW']);
    expect(result.attempts).toEqual([
      { dataflow: 'PT', outcome: 'empty', detail: 'no rows' },
      { dataflow: 'CHILD_PROTECTION', outcome: 'not-found', detail: 'HTTP 404' },
    ]);
  });

  it('tries a preferred dataflow first', async () => {
    const fetcher = new FakeFetcher({ CME: succeedWith(ROWS) });
    const result = await controllerFor(fetcher).fetchWithFallback(spec, {
      store,
      level: 'minimal',
      preferredDataflow: 'CME_DF_2021_WQ',
    });

    expect(result.tried).toEqual(['CME_DF_2021_WQ', 'CME']);
  });

  it('throws NotFoundAllCandidatesError listing every candidate', async () => {
    const fetcher = new FakeFetcher({ CME: outcome('empty') });
    const error = await controllerFor(fetcher)
      .fetchWithFallback(spec, { store, level: 'minimal' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundAllCandidatesError);
    if (!(error instanceof NotFoundAllCandidatesError)) return;
    expect(error.tried).toEqual(['CME', 'GLOBAL_DATAFLOW']);
    expect(error.attempts.map((a) => a.outcome)).toEqual(['empty', 'not-found']);
  });

  it('resolves unknown codes through the prefix table', async () => {
    const fetcher = new FakeFetcher({});
    const error = await controllerFor(fetcher)
      .fetchWithFallback(buildQuerySpec({ indicatorCode: 'ZZ_UNKNOWN' }), { store, level: 'minimal' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundAllCandidatesError);
    expect(fetcher.calls.map((call) => call.dataflow)).toEqual(['GLOBAL_DATAFLOW']);
  });

  it('throws TransientExhaustedError when any candidate failed transiently', async () => {
    const fetcher = new FakeFetcher({ CME: outcome('transient-error') });
    const error = await controllerFor(fetcher)
      .fetchWithFallback(spec, { store, level: 'minimal' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientExhaustedError);
    if (!(error instanceof TransientExhaustedError)) return;
    expect(error.tried).toEqual(['CME', 'GLOBAL_DATAFLOW']);
    expect(error.attempts[0]).toEqual({
      dataflow: 'CME',
      outcome: 'transient-error',
      detail: '4 attempt(s): HTTP 503: Service Unavailable',
    });
  });

  it('stops the walk on a fatal outcome', async () => {
    const fetcher = new FakeFetcher({ CME: outcome('fatal-error'), GLOBAL_DATAFLOW: succeedWith(ROWS) });
    const error = await controllerFor(fetcher)
      .fetchWithFallback(spec, { store, level: 'minimal' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FatalQueryError);
    if (!(error instanceof FatalQueryError)) return;
    expect(error.message).toBe(
      "Query for 'CME_MRY0T4' rejected by dataflow CME: HTTP 400: Bad Request"
    );
    expect(error.status).toBe(400);
    expect(fetcher.calls.map((call) => call.dataflow)).toEqual(['CME']);
  });

  it('surfaces a page-ceiling overflow as PaginationOverflowError', async () => {
    let year = 2000;
    const { fetchImpl, urls } = sequenceFetch([
      () =>
        csvResponse(
          csvBody(['REF_AREA', 'INDICATOR', 'SEX', 'TIME_PERIOD', 'OBS_VALUE'], [
            ['BRA', 'CME_MRY0T4', '_T', String(year++), '14.2'],
          ])
        ),
    ]);
    const executor = new FetchExecutor({
      http: new HTTPClient({}, { fetchImpl, sleep: noSleep, logger: silentLogger }),
      endpoint: { baseUrl: 'https://sdmx.test/rest', agency: 'UNICEF', version: '1.0' },
      pagination: { pageSize: 1, maxPages: 2 },
      logger: silentLogger,
    });

    const error = await new FallbackController({ executor, logger: silentLogger })
      .fetchWithFallback(spec, { store, level: 'minimal' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaginationOverflowError);
    if (!(error instanceof PaginationOverflowError)) return;
    expect(error.maxPages).toBe(2);
    expect(error.rowsReceived).toBe(2);
    expect(exitCodeFor(error)).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    expect(urls).toHaveLength(2);
  });

  it('raises DeadlineExceededError when the deadline elapses mid-walk', async () => {
    const fetcher = new FakeFetcher({ CME: waitForAbort });
    const error = await controllerFor(fetcher)
      .fetchWithFallback(spec, { store, level: 'minimal', deadlineMs: 20 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    if (!(error instanceof DeadlineExceededError)) return;
    expect(error.tried).toEqual(['CME']);
    expect(fetcher.calls).toHaveLength(1);
  });

  it('propagates caller cancellation without trying further candidates', async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher({
      CME: (dataflow, querySpec, options) => {
        controller.abort();
        return waitForAbort(dataflow, querySpec, options);
      },
    });

    await expect(
      controllerFor(fetcher).fetchWithFallback(spec, {
        store,
        level: 'minimal',
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(FetchCancelledError);
    expect(fetcher.calls).toHaveLength(1);
  });

  it('does not call the executor when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fetcher = new FakeFetcher({ CME: succeedWith(ROWS) });

    await expect(
      controllerFor(fetcher).fetchWithFallback(spec, {
        store,
        level: 'minimal',
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(FetchCancelledError);
    expect(fetcher.calls).toEqual([]);
  });
});
