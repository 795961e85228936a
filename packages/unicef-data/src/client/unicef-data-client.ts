/**
 * unicef-data client
 *
 * Entry point for library callers. Validates the request, runs one fallback
 * walk per indicator (bounded by `concurrency`), then applies the
 * post-processing chain in a fixed order:
 *
 *   year list / circa -> duplicate check -> dropna -> mrv -> latest -> format
 *
 * Metadata is held by an injected MetadataRegistry; `reload()` swaps it
 * atomically and `clearCache()` drops it until next use.
 *
 * @example
 * ```typescript
 * const client = new UnicefDataClient();
 * const result = await client.fetch('CME_MRY0T4', {
 *   countries: ['ALB', 'USA'],
 *   year: '2015:2020',
 * });
 * console.log(result.records.length);
 * ```
 *
 * @module client/unicef-data-client
 */

import { resolveClientConfig, type ClientConfig, type ClientConfigOverrides } from '../core/config.js';
import {
  DuplicateRowsError,
  FetchCancelledError,
  InvalidQueryError,
  toError,
} from '../core/errors.js';
import { HTTPClient, type FetchImpl } from '../core/http-client.js';
import type { DataflowSchema, IndicatorEntry } from '../core/types.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import { FallbackController, type FallbackResult } from '../fallback/fallback-controller.js';
import { FetchExecutor, type CandidateFetcher } from '../fetch/fetch-executor.js';
import { buildQuerySpec } from '../fetch/query-builder.js';
import { MetadataRegistry, type MetadataStatus } from '../metadata/registry.js';
import {
  listCategories,
  searchIndicators,
  type CategoryCount,
  type SearchOptions,
  type SearchResult,
} from '../metadata/search.js';
import type { MetadataStore } from '../metadata/store.js';
import type { CanonicalRecord, MinimalRecord, SchemaLevel, StandardRecord } from '../normalize/schema.js';
import { explainResolution, type Resolution, type ResolveOptions } from '../resolver/dataflow-resolver.js';
import type { SleepFn } from '../resilience/backoff.js';
import {
  applyCirca,
  dropMissing,
  filterYears,
  findDuplicates,
  latestOnly,
  mostRecent,
} from '../transform/post-process.js';
import { toWide, toWideAttributes, toWideIndicators, type PivotDimension, type WideTable } from '../transform/wide.js';
import { circaTargets, parseYear, type YearInput } from '../transform/years.js';

export type OutputFormat = 'long' | 'wide' | 'wide_indicators' | 'wide_attributes';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['long', 'wide', 'wide_indicators', 'wide_attributes'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface FetchRequest {
  /** ISO3 or aggregate codes; omitted or 'all' means every area */
  readonly countries?: string | readonly string[] | null;
  readonly year?: YearInput | null;
  /** Dimension id -> allowed code(s), applied strictly */
  readonly filters?: Readonly<Record<string, string | readonly string[]>>;
  /** Shortcut for `filters.SEX` */
  readonly sex?: string | readonly string[];
  /** Put `_T` for unfiltered total-bearing dimensions into the query key */
  readonly totals?: boolean;
  /** Keep every disaggregation instead of defaulting to totals */
  readonly keepDisaggregations?: boolean;
  /** Dataflow tried before the resolved candidates */
  readonly dataflow?: string;
  readonly level?: SchemaLevel;
  readonly format?: OutputFormat;
  /** Dimension(s) for `wide_attributes` */
  readonly pivot?: PivotDimension | readonly PivotDimension[];
  /** Closest available period to each target year instead of exact matches */
  readonly circa?: boolean;
  readonly dropna?: boolean;
  /** Keep the N most recent periods per country and indicator */
  readonly mrv?: number;
  /** Keep only the latest non-missing value per country and indicator */
  readonly latest?: boolean;
  /** Remove exact duplicate rows instead of failing */
  readonly ignoreDuplicates?: boolean;
  /** Per-indicator deadline; overrides the configured one */
  readonly deadlineMs?: number | null;
  readonly signal?: AbortSignal;
}

export interface IndicatorSummary {
  readonly indicatorCode: string;
  readonly dataflow: string;
  readonly tier: Resolution['tier'];
  readonly tried: readonly string[];
  readonly rows: number;
}

export interface IndicatorFailure {
  readonly indicatorCode: string;
  readonly error: Error;
}

export interface FetchResult<L extends SchemaLevel> {
  readonly level: L;
  readonly format: OutputFormat;
  /** Long records after post-processing */
  readonly records: CanonicalRecord<L>[];
  /** Reshaped table for wide formats, null for long */
  readonly table: WideTable | null;
  readonly indicators: readonly IndicatorSummary[];
  /** Indicators that failed while others succeeded */
  readonly failures: readonly IndicatorFailure[];
}

export interface UnicefDataClientOptions {
  readonly config?: ClientConfigOverrides;
  readonly registry?: MetadataRegistry;
  /** Replaces the HTTP-backed executor */
  readonly executor?: CandidateFetcher;
  readonly fetchImpl?: FetchImpl;
  readonly sleep?: SleepFn;
  readonly random?: () => number;
  readonly logger?: Logger;
}

type WalkOutcome =
  | { readonly ok: true; readonly result: FallbackResult<SchemaLevel> }
  | { readonly ok: false; readonly failure: IndicatorFailure };

function toCountryList(countries: FetchRequest['countries']): readonly string[] | 'all' | null | undefined {
  if (typeof countries !== 'string') {
    return countries;
  }
  return countries.trim().toLowerCase() === 'all' ? 'all' : countries.split(/[\s,]+/).filter((code) => code !== '');
}

function isStandardRecord(record: MinimalRecord): record is StandardRecord {
  return 'sex' in record;
}

export class UnicefDataClient {
  readonly config: ClientConfig;
  readonly registry: MetadataRegistry;
  private readonly controller: FallbackController;
  private readonly logger: Logger;

  constructor(options: UnicefDataClientOptions = {}) {
    this.config = resolveClientConfig(options.config);
    this.logger = options.logger ?? rootLogger.child('client');
    this.registry =
      options.registry ??
      new MetadataRegistry({
        directory: this.config.metadataDir,
        staleAfterDays: this.config.staleAfterDays,
        logger: this.logger,
      });

    const executor =
      options.executor ??
      new FetchExecutor({
        http: new HTTPClient(
          {
            maxRetries: this.config.maxRetries,
            initialDelayMs: this.config.initialDelayMs,
            maxDelayMs: this.config.maxDelayMs,
            jitterFactor: this.config.jitterFactor,
            timeoutMs: this.config.timeoutMs,
            userAgent: this.config.userAgent,
          },
          { fetchImpl: options.fetchImpl, sleep: options.sleep, random: options.random, logger: this.logger }
        ),
        endpoint: this.config.endpoint,
        pagination: this.config.pagination,
        logger: this.logger,
      });

    this.controller = new FallbackController({ executor, logger: this.logger });
  }

  /**
   * Fetch one or more indicators
   *
   * With a single indicator, its failure is thrown. With several, failed
   * indicators are reported in `failures` and only an all-failed batch
   * throws (the first indicator's error).
   *
   * @throws {InvalidQueryError} bad request, before any network call
   * @throws {DuplicateRowsError} exact duplicates without `ignoreDuplicates`
   */
  fetch<L extends SchemaLevel>(
    indicators: string | readonly string[],
    request: FetchRequest & { readonly level: L }
  ): Promise<FetchResult<L>>;
  fetch(indicators: string | readonly string[], request?: FetchRequest): Promise<FetchResult<SchemaLevel>>;
  async fetch(indicators: string | readonly string[], request: FetchRequest = {}): Promise<FetchResult<SchemaLevel>> {
    const codes = this.normalizeIndicators(indicators);
    const level = request.level ?? this.config.schemaLevel;
    const format = request.format ?? 'long';
    const pivotOn = this.validateFormat(format, level, request.pivot);

    const years = parseYear(request.year);
    const filters: Record<string, string | readonly string[]> = { ...request.filters };
    if (request.sex !== undefined) {
      filters.SEX = request.sex;
    }
    const countries = toCountryList(request.countries);
    // Validate every indicator up front so a bad code fails before any request
    const specs = codes.map((indicatorCode) =>
      buildQuerySpec({ indicatorCode, countries, years, filters, totals: request.totals })
    );

    const store = await this.registry.current();
    const deadlineMs = request.deadlineMs !== undefined ? request.deadlineMs : this.config.deadlineMs;

    const outcomes = await this.runPool(specs, async (spec): Promise<WalkOutcome> => {
      try {
        const result = await this.controller.fetchWithFallback(spec, {
          store,
          level,
          preferredDataflow: request.dataflow,
          deadlineMs,
          signal: request.signal,
          applyTotals: request.keepDisaggregations !== true,
        });
        return { ok: true, result };
      } catch (error) {
        if (error instanceof FetchCancelledError) {
          throw error;
        }
        return { ok: false, failure: { indicatorCode: spec.indicatorCode, error: toError(error) } };
      }
    });

    const succeeded: FallbackResult<SchemaLevel>[] = [];
    const failures: IndicatorFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        succeeded.push(outcome.result);
      } else {
        failures.push(outcome.failure);
        this.logger.warn('Indicator failed', {
          indicator: outcome.failure.indicatorCode,
          error: outcome.failure.error.message,
        });
      }
    }

    const firstFailure = failures[0];
    if (succeeded.length === 0 && firstFailure) {
      throw firstFailure.error;
    }

    let records: CanonicalRecord<SchemaLevel>[] = [];
    for (const result of succeeded) {
      for (const record of result.records) {
        records.push(record);
      }
    }

    if (years?.list && !request.circa) {
      records = filterYears(records, years.list);
    } else if (years && request.circa) {
      records = applyCirca(records, circaTargets(years));
    }

    const { unique, duplicates } = findDuplicates(records);
    if (duplicates > 0) {
      if (!request.ignoreDuplicates) {
        throw new DuplicateRowsError(duplicates);
      }
      this.logger.warn('Removed exact duplicate rows', { duplicates });
      records = unique;
    }

    if (request.dropna) {
      records = dropMissing(records);
    }
    if (request.mrv !== undefined && request.mrv > 0) {
      records = mostRecent(records, request.mrv);
    }
    if (request.latest) {
      records = latestOnly(records);
    }

    return {
      level,
      format,
      records,
      table: this.reshape(records, format, pivotOn),
      indicators: succeeded.map((result) => ({
        indicatorCode: result.indicatorCode,
        dataflow: result.dataflow,
        tier: result.tier,
        tried: result.tried,
        rows: result.records.length,
      })),
      failures,
    };
  }

  /**
   * Candidate dataflows for an indicator, with the tier that produced them
   */
  async resolve(indicatorCode: string, options: ResolveOptions = {}): Promise<Resolution> {
    return explainResolution(await this.registry.current(), indicatorCode, options);
  }

  async indicatorInfo(indicatorCode: string): Promise<IndicatorEntry | undefined> {
    return (await this.registry.current()).getIndicator(indicatorCode.trim());
  }

  async search(options: SearchOptions = {}): Promise<SearchResult> {
    return searchIndicators(await this.registry.current(), options);
  }

  async categories(): Promise<CategoryCount[]> {
    return listCategories(await this.registry.current());
  }

  async dataflows(): Promise<DataflowSchema[]> {
    return (await this.registry.current()).listDataflows();
  }

  metadata(): Promise<MetadataStore> {
    return this.registry.current();
  }

  metadataStatus(): MetadataStatus {
    return this.registry.status();
  }

  /**
   * Re-read the metadata tables and swap them in
   */
  reload(): Promise<MetadataStore> {
    return this.registry.reload();
  }

  /**
   * Forget loaded metadata; the next call reloads it
   */
  clearCache(): void {
    this.registry.clear();
  }

  private normalizeIndicators(indicators: string | readonly string[]): string[] {
    const list = typeof indicators === 'string' ? indicators.split(/[\s,]+/) : indicators;
    const codes = [...new Set(list.map((code) => code.trim()).filter((code) => code !== ''))];
    if (codes.length === 0) {
      throw new InvalidQueryError('At least one indicator code is required');
    }
    return codes;
  }

  private validateFormat(
    format: OutputFormat,
    level: SchemaLevel,
    pivot: FetchRequest['pivot']
  ): readonly PivotDimension[] {
    if (format !== 'wide_attributes') {
      return [];
    }
    const pivotOn = pivot === undefined ? [] : typeof pivot === 'string' ? [pivot] : [...pivot];
    if (pivotOn.length === 0) {
      throw new InvalidQueryError("Format 'wide_attributes' requires a pivot dimension");
    }
    if (level === 'minimal') {
      throw new InvalidQueryError("Format 'wide_attributes' needs the 'standard' schema level or above");
    }
    return pivotOn;
  }

  private reshape(
    records: readonly CanonicalRecord<SchemaLevel>[],
    format: OutputFormat,
    pivotOn: readonly PivotDimension[]
  ): WideTable | null {
    switch (format) {
      case 'long':
        return null;
      case 'wide':
        return toWide(records);
      case 'wide_indicators':
        return toWideIndicators(records);
      case 'wide_attributes':
        return toWideAttributes(records.filter(isStandardRecord), pivotOn);
    }
  }

  /**
   * Run tasks with at most `concurrency` in flight; results keep input order
   */
  private async runPool<T, R>(items: readonly T[], task: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    const concurrency = Math.max(1, Math.min(this.config.concurrency, items.length));
    let currentIndex = 0;

    const worker = async (): Promise<void> => {
      while (currentIndex < items.length) {
        const index = currentIndex++;
        const item = items[index];
        if (item === undefined) break;
        results[index] = await task(item);
      }
    };

    const running: Array<Promise<void>> = [];
    for (let i = 0; i < concurrency; i++) {
      running.push(worker());
    }
    await Promise.all(running);

    return results;
  }
}
