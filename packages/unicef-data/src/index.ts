/**
 * unicef-data
 *
 * Indicator-to-dataflow resolution, SDMX fetch with retry, pagination and
 * fallback, and normalization into a canonical long-format schema.
 *
 * @packageDocumentation
 */

// Client
export {
  UnicefDataClient,
  OUTPUT_FORMATS,
  isOutputFormat,
  type FetchRequest,
  type FetchResult,
  type IndicatorFailure,
  type IndicatorSummary,
  type OutputFormat,
  type UnicefDataClientOptions,
} from './client/unicef-data-client.js';

// Configuration
export {
  BUNDLED_METADATA_DIR,
  DEFAULT_CLIENT_CONFIG,
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigOverrides,
  type PaginationConfig,
  type SdmxEndpointConfig,
} from './core/config.js';

// Errors
export {
  UnicefDataError,
  InvalidQueryError,
  CandidatesExhaustedError,
  NotFoundAllCandidatesError,
  TransientExhaustedError,
  FatalQueryError,
  PaginationOverflowError,
  MetadataUnavailableError,
  DeadlineExceededError,
  FetchCancelledError,
  DuplicateRowsError,
  type UnicefDataErrorCode,
} from './core/errors.js';

// Core types
export {
  DEFAULT_SEQUENCE_KEY,
  TOTAL_CODE,
  UNIVERSAL_FALLBACK_DATAFLOW,
  type CandidateAttempt,
  type DataflowSchema,
  type FetchOutcome,
  type FetchOutcomeKind,
  type IndicatorEntry,
  type IndicatorTier,
  type QuerySpec,
  type RawRecord,
  type YearRange,
} from './core/types.js';

export { HTTPClient, type FetchImpl, type HTTPClientConfig } from './core/http-client.js';
export { Logger, createLogger, stderrSink, type LogLevel, type LogSink } from './core/utils/logger.js';

// Metadata
export { MetadataStore, type MetadataSource } from './metadata/store.js';
export { loadMetadata, type MetadataLoadReport } from './metadata/loader.js';
export { MetadataRegistry, type MetadataStatus } from './metadata/registry.js';
export { DEFAULT_FALLBACK_SEQUENCES } from './metadata/defaults.js';
export {
  listCategories,
  searchIndicators,
  type CategoryCount,
  type IndicatorMatch,
  type SearchOptions,
  type SearchResult,
} from './metadata/search.js';

// Resolution, fetch and fallback
export {
  DataflowResolver,
  explainResolution,
  extractPrefix,
  resolveCandidates,
  type Resolution,
  type ResolutionTier,
} from './resolver/dataflow-resolver.js';
export { buildDataUrl, buildQuerySpec, buildSeriesKey, type QuerySpecInput } from './fetch/query-builder.js';
export { FetchExecutor, type CandidateFetcher, type ExecuteOptions } from './fetch/fetch-executor.js';
export { FallbackController, type FallbackResult } from './fallback/fallback-controller.js';

// Normalization and transforms
export {
  SCHEMA_COLUMNS,
  SCHEMA_LEVELS,
  columnsFor,
  projectRecord,
  type CanonicalRecord,
  type ExtendedRecord,
  type FullRecord,
  type MinimalRecord,
  type SchemaLevel,
  type StandardRecord,
} from './normalize/schema.js';
export { normalize, normalizeDetailed, type NormalizeContext } from './normalize/normalizer.js';
export { parsePeriod } from './normalize/period.js';
export { parseYear, type YearInput } from './transform/years.js';
export { toWide, toWideAttributes, toWideIndicators, type PivotDimension, type WideTable } from './transform/wide.js';
