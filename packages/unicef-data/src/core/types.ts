/**
 * Core domain types for indicator resolution and fetch
 *
 * @module core/types
 */

/** Catch-all dataflow that terminates every fallback chain */
export const UNIVERSAL_FALLBACK_DATAFLOW = 'GLOBAL_DATAFLOW';

/** Key of the fallback table entry used for unknown prefixes */
export const DEFAULT_SEQUENCE_KEY = 'DEFAULT';

/** The SDMX code for a total / aggregate category */
export const TOTAL_CODE = '_T';

// ============================================================================
// Metadata
// ============================================================================

/**
 * Data-availability confidence assigned at metadata sync time
 */
export type IndicatorTier = 'verified' | 'limited_or_deprecated' | 'no_data' | 'orphan';

export interface IndicatorEntry {
  readonly code: string;
  readonly name: string;
  /** Ordered, de-duplicated. Empty when the sync could not place the indicator. */
  readonly directDataflows: readonly string[];
  readonly tier: IndicatorTier;
  readonly tierReason?: string;
  /** SDMX dimension ids, upper case (SEX, AGE, ...) */
  readonly disaggregations: readonly string[];
  /** Subset of disaggregations that carry a `_T` total */
  readonly disaggregationsWithTotals: readonly string[];
  readonly category?: string;
  readonly description?: string;
}

export interface DataflowDimension {
  readonly id: string;
  /** 1-based position in the series key */
  readonly position: number;
  readonly codelist?: string;
  readonly values?: readonly string[];
}

export interface DataflowAttribute {
  readonly id: string;
  readonly codelist?: string;
}

export interface DataflowSchema {
  readonly id: string;
  readonly name?: string;
  readonly agency: string;
  readonly version: string;
  /** Sorted by position */
  readonly dimensions: readonly DataflowDimension[];
  readonly timeDimension: string;
  readonly primaryMeasure: string;
  readonly attributes: readonly DataflowAttribute[];
}

// ============================================================================
// Query
// ============================================================================

export interface YearRange {
  readonly start?: number;
  readonly end?: number;
  /** Non-contiguous target years; start/end then span the list */
  readonly list?: readonly number[];
}

export interface QuerySpec {
  readonly indicatorCode: string;
  readonly countries: readonly string[] | 'all';
  readonly years?: YearRange;
  /** Dimension id (upper case) -> allowed codes */
  readonly filters: Readonly<Record<string, readonly string[]>>;
  /** Push `_T` defaults for unfiltered total-bearing dimensions into the key */
  readonly totals: boolean;
}

/** One parsed CSV row, keyed by the source header */
export type RawRecord = Readonly<Record<string, string>>;

// ============================================================================
// Fetch outcomes
// ============================================================================

export interface SuccessOutcome {
  readonly kind: 'success';
  readonly dataflow: string;
  readonly url: string;
  readonly rows: readonly RawRecord[];
  readonly pages: number;
}

export interface EmptyOutcome {
  readonly kind: 'empty';
  readonly dataflow: string;
  readonly url: string;
}

export interface NotFoundOutcome {
  readonly kind: 'not-found';
  readonly dataflow: string;
  readonly url: string;
  /** null when the rejection came as an SDMX error body on a 2xx */
  readonly status: number | null;
  readonly reason: string;
}

export interface TransientErrorOutcome {
  readonly kind: 'transient-error';
  readonly dataflow: string;
  readonly url: string;
  readonly cause: Error;
  readonly attempts: number;
}

export interface FatalErrorOutcome {
  readonly kind: 'fatal-error';
  readonly dataflow: string;
  readonly url: string;
  readonly cause: Error;
  readonly status: number | null;
}

export type FetchOutcome =
  | SuccessOutcome
  | EmptyOutcome
  | NotFoundOutcome
  | TransientErrorOutcome
  | FatalErrorOutcome;

export type FetchOutcomeKind = FetchOutcome['kind'];

/** Per-candidate record kept by the fallback walk */
export interface CandidateAttempt {
  readonly dataflow: string;
  readonly outcome: Exclude<FetchOutcomeKind, 'success'>;
  readonly detail: string;
}
