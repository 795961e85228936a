/**
 * Fallback Controller
 *
 * Walks the resolved candidate dataflows strictly in order, one at a time,
 * and returns the first successful response, normalized. empty, not-found
 * and exhausted transient outcomes move on to the next candidate; a fatal
 * outcome stops the walk at once. Reaching the page ceiling is fatal and
 * surfaces as the PaginationOverflowError itself.
 *
 * When no candidate succeeds the error lists every dataflow tried, in
 * order. If any of them failed transiently the error is a
 * TransientExhaustedError, otherwise NotFoundAllCandidatesError.
 *
 * @module fallback/fallback-controller
 */

import {
  DeadlineExceededError,
  FatalQueryError,
  FetchCancelledError,
  NotFoundAllCandidatesError,
  PaginationOverflowError,
  TransientExhaustedError,
} from '../core/errors.js';
import type { CandidateAttempt, FetchOutcome, QuerySpec } from '../core/types.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import type { CandidateFetcher } from '../fetch/fetch-executor.js';
import type { MetadataStore } from '../metadata/store.js';
import { normalizeDetailed } from '../normalize/normalizer.js';
import type { CanonicalRecord, SchemaLevel } from '../normalize/schema.js';
import { explainResolution, type ResolutionTier } from '../resolver/dataflow-resolver.js';

export interface FallbackControllerOptions {
  readonly executor: CandidateFetcher;
  readonly logger?: Logger;
}

export interface FallbackFetchOptions<L extends SchemaLevel> {
  readonly store: MetadataStore;
  readonly level: L;
  /** Tried before the resolved candidates */
  readonly preferredDataflow?: string;
  /** Overall budget for the whole walk; null or undefined means none */
  readonly deadlineMs?: number | null;
  readonly signal?: AbortSignal;
  /** Default-filter disaggregations to totals during normalization */
  readonly applyTotals?: boolean;
}

export interface FallbackResult<L extends SchemaLevel> {
  readonly indicatorCode: string;
  readonly dataflow: string;
  readonly tier: ResolutionTier;
  /** Candidates walked, ending with the one that answered */
  readonly tried: readonly string[];
  /** Rejected candidates before the one that answered */
  readonly attempts: readonly CandidateAttempt[];
  readonly url: string;
  readonly pages: number;
  readonly rawRows: number;
  readonly records: CanonicalRecord<L>[];
}

function describe(outcome: Exclude<FetchOutcome, { kind: 'success' }>): string {
  switch (outcome.kind) {
    case 'empty':
      return 'no rows';
    case 'not-found':
      return outcome.status !== null ? `HTTP ${outcome.status}` : outcome.reason;
    case 'transient-error':
      return `${outcome.attempts} attempt(s): ${outcome.cause.message}`;
    case 'fatal-error':
      return outcome.cause.message;
  }
}

export class FallbackController {
  private readonly executor: CandidateFetcher;
  private readonly logger: Logger;

  constructor(options: FallbackControllerOptions) {
    this.executor = options.executor;
    this.logger = options.logger ?? rootLogger.child('fallback');
  }

  /**
   * Fetch one indicator, falling back across candidate dataflows
   *
   * @throws {FatalQueryError} a candidate rejected the request as malformed
   * @throws {PaginationOverflowError} a candidate hit the page ceiling
   * @throws {NotFoundAllCandidatesError} every candidate was empty or not found
   * @throws {TransientExhaustedError} no success and at least one transient failure
   * @throws {DeadlineExceededError} the overall deadline elapsed
   * @throws {FetchCancelledError} the caller aborted
   */
  async fetchWithFallback<L extends SchemaLevel>(
    spec: QuerySpec,
    options: FallbackFetchOptions<L>
  ): Promise<FallbackResult<L>> {
    const { store } = options;
    const resolution = explainResolution(store, spec.indicatorCode, {
      preferred: options.preferredDataflow,
    });
    const indicator = store.getIndicator(resolution.indicatorCode);

    this.logger.debug('Resolved candidate dataflows', {
      indicator: resolution.indicatorCode,
      tier: resolution.tier,
      candidates: resolution.candidates,
    });

    const deadline = new DeadlineSignal(options.deadlineMs ?? null, options.signal);
    const tried: string[] = [];
    const attempts: CandidateAttempt[] = [];

    try {
      for (const dataflow of resolution.candidates) {
        deadline.check(resolution.indicatorCode, tried);

        if (tried.length > 0) {
          this.logger.info('Trying fallback dataflow', {
            indicator: resolution.indicatorCode,
            dataflow,
            previous: tried[tried.length - 1],
          });
        }
        tried.push(dataflow);

        let outcome: FetchOutcome;
        try {
          outcome = await this.executor.fetch(dataflow, spec, {
            schema: store.getDataflowSchema(dataflow),
            totalsFor: indicator?.disaggregationsWithTotals ?? [],
            signal: deadline.signal,
          });
        } catch (error) {
          if (error instanceof FetchCancelledError) {
            deadline.check(resolution.indicatorCode, tried);
          }
          throw error;
        }

        if (outcome.kind === 'success') {
          const normalized = normalizeDetailed(outcome.rows, {
            level: options.level,
            dataflow,
            indicator,
            lookups: store,
            filters: spec.filters,
            countries: spec.countries,
            applyTotals: options.applyTotals,
          });
          if (normalized.defaultsApplied.size > 0) {
            this.logger.debug('Applied total defaults', {
              indicator: resolution.indicatorCode,
              defaults: Object.fromEntries(normalized.defaultsApplied),
            });
          }
          this.logger.info('Indicator fetched', {
            indicator: resolution.indicatorCode,
            dataflow,
            rows: normalized.records.length,
          });
          return {
            indicatorCode: resolution.indicatorCode,
            dataflow,
            tier: resolution.tier,
            tried,
            attempts,
            url: outcome.url,
            pages: outcome.pages,
            rawRows: outcome.rows.length,
            records: normalized.records,
          };
        }

        if (outcome.kind === 'fatal-error') {
          if (outcome.cause instanceof PaginationOverflowError) {
            throw outcome.cause;
          }
          this.logger.error('Query rejected', {
            indicator: resolution.indicatorCode,
            dataflow,
            status: outcome.status,
            error: outcome.cause.message,
          });
          throw new FatalQueryError(
            `Query for '${resolution.indicatorCode}' rejected by dataflow ${dataflow}: ${outcome.cause.message}`,
            outcome.url,
            dataflow,
            outcome.status,
            { cause: outcome.cause }
          );
        }

        attempts.push({ dataflow, outcome: outcome.kind, detail: describe(outcome) });
        this.logger.debug('Candidate rejected', {
          indicator: resolution.indicatorCode,
          dataflow,
          outcome: outcome.kind,
        });
      }
    } finally {
      deadline.dispose();
    }

    if (attempts.some((attempt) => attempt.outcome === 'transient-error')) {
      throw new TransientExhaustedError(resolution.indicatorCode, tried, attempts);
    }
    throw new NotFoundAllCandidatesError(resolution.indicatorCode, tried, attempts);
  }
}

/**
 * Abort signal that fires on caller cancellation or when the deadline
 * elapses, whichever comes first
 */
class DeadlineSignal {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout> | null;
  private readonly onCallerAbort = (): void => this.controller.abort();
  private expired = false;

  constructor(
    private readonly deadlineMs: number | null,
    private readonly caller: AbortSignal | undefined
  ) {
    if (caller?.aborted) {
      this.controller.abort();
    } else {
      caller?.addEventListener('abort', this.onCallerAbort, { once: true });
    }

    this.timer =
      deadlineMs !== null
        ? setTimeout(() => {
            this.expired = true;
            this.controller.abort();
          }, deadlineMs)
        : null;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Throw if the walk must stop
   */
  check(indicatorCode: string, tried: readonly string[]): void {
    if (this.caller?.aborted) {
      throw new FetchCancelledError(undefined, { cause: this.caller.reason });
    }
    if (this.expired && this.deadlineMs !== null) {
      throw new DeadlineExceededError(indicatorCode, this.deadlineMs, [...tried]);
    }
  }

  dispose(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
    }
    this.caller?.removeEventListener('abort', this.onCallerAbort);
  }
}
