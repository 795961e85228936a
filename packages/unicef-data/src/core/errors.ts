/**
 * unicef-data Error Types
 *
 * Every failure surfaced to callers extends UnicefDataError and carries a
 * stable `code`. Transport-level errors (HTTPError and friends) stay inside
 * the HTTP client and are folded into FetchOutcome values by the executor.
 */

import type { CandidateAttempt } from './types.js';

export type UnicefDataErrorCode =
  | 'INVALID_QUERY'
  | 'NOT_FOUND_ALL_CANDIDATES'
  | 'TRANSIENT_EXHAUSTED'
  | 'FATAL_QUERY'
  | 'PAGINATION_OVERFLOW'
  | 'METADATA_UNAVAILABLE'
  | 'DEADLINE_EXCEEDED'
  | 'FETCH_CANCELLED'
  | 'DUPLICATE_ROWS';

export abstract class UnicefDataError extends Error {
  abstract readonly code: UnicefDataErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Caller input rejected before any request was made
 */
export class InvalidQueryError extends UnicefDataError {
  readonly code = 'INVALID_QUERY';

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Every candidate dataflow was walked without an accepted response.
 *
 * `tried` is exactly the resolved candidate list, in order.
 */
export abstract class CandidatesExhaustedError extends UnicefDataError {
  constructor(
    message: string,
    public readonly indicatorCode: string,
    public readonly tried: readonly string[],
    public readonly attempts: readonly CandidateAttempt[]
  ) {
    super(message);
  }

  /**
   * Get formatted per-candidate summary
   */
  getSummary(): string {
    const lines: string[] = [`Indicator '${this.indicatorCode}': ${this.attempts.length} dataflows tried`];
    for (const attempt of this.attempts) {
      lines.push(`  ${attempt.dataflow}: ${attempt.outcome} (${attempt.detail})`);
    }
    return lines.join('\n');
  }
}

export class NotFoundAllCandidatesError extends CandidatesExhaustedError {
  readonly code = 'NOT_FOUND_ALL_CANDIDATES';

  constructor(indicatorCode: string, tried: readonly string[], attempts: readonly CandidateAttempt[]) {
    super(
      `Not Found (404): Indicator '${indicatorCode}' not found in any dataflow.\n` +
        `  Tried dataflows: ${tried.join(', ')}`,
      indicatorCode,
      tried,
      attempts
    );
  }
}

export class TransientExhaustedError extends CandidatesExhaustedError {
  readonly code = 'TRANSIENT_EXHAUSTED';

  constructor(indicatorCode: string, tried: readonly string[], attempts: readonly CandidateAttempt[]) {
    const failing = attempts
      .filter((a) => a.outcome === 'transient-error')
      .map((a) => a.dataflow);
    super(
      `Indicator '${indicatorCode}' could not be fetched: ${failing.length} dataflow(s) failed ` +
        `with transient errors after retries (${failing.join(', ')}).\n` +
        `  Tried dataflows: ${tried.join(', ')}`,
      indicatorCode,
      tried,
      attempts
    );
  }
}

/**
 * Request rejected as malformed. Not retried, not advanced past.
 */
export class FatalQueryError extends UnicefDataError {
  readonly code = 'FATAL_QUERY';

  constructor(
    message: string,
    public readonly url: string,
    public readonly dataflow: string,
    public readonly status: number | null,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PaginationOverflowError extends UnicefDataError {
  readonly code = 'PAGINATION_OVERFLOW';

  constructor(
    public readonly url: string,
    public readonly maxPages: number,
    public readonly rowsReceived: number
  ) {
    super(
      `Pagination ceiling of ${maxPages} pages reached after ${rowsReceived} rows: ${url}`
    );
  }
}

/**
 * A metadata file could not be read. Reported by the loader, which then
 * continues on the built-in defaults.
 */
export class MetadataUnavailableError extends UnicefDataError {
  readonly code = 'METADATA_UNAVAILABLE';

  constructor(
    public readonly path: string,
    reason: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Metadata unavailable at ${path}: ${reason}`, options);
  }
}

export class DeadlineExceededError extends UnicefDataError {
  readonly code = 'DEADLINE_EXCEEDED';

  constructor(
    public readonly indicatorCode: string,
    public readonly deadlineMs: number,
    public readonly tried: readonly string[]
  ) {
    super(
      `Deadline of ${deadlineMs}ms exceeded for '${indicatorCode}'` +
        (tried.length > 0 ? ` after trying: ${tried.join(', ')}` : '')
    );
  }
}

export class FetchCancelledError extends UnicefDataError {
  readonly code = 'FETCH_CANCELLED';

  constructor(
    public readonly url?: string,
    options?: { readonly cause?: unknown }
  ) {
    super(url ? `Fetch cancelled: ${url}` : 'Fetch cancelled', options);
  }
}

export class DuplicateRowsError extends UnicefDataError {
  readonly code = 'DUPLICATE_ROWS';

  constructor(public readonly duplicates: number) {
    super(
      `Found ${duplicates} exact duplicate rows (all values identical). ` +
        'Set ignoreDuplicates to remove them.'
    );
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
