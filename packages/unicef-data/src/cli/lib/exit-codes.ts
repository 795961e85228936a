/**
 * Process exit codes and the error -> exit code mapping
 *
 * @module cli/lib/exit-codes
 */

import {
  DeadlineExceededError,
  DuplicateRowsError,
  FetchCancelledError,
  MetadataUnavailableError,
  PaginationOverflowError,
  TransientExhaustedError,
  CandidatesExhaustedError,
} from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof FetchCancelledError) {
    return EXIT_CODES.USER_CANCELLED;
  }
  if (error instanceof TransientExhaustedError || error instanceof DeadlineExceededError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof DuplicateRowsError || error instanceof PaginationOverflowError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (error instanceof MetadataUnavailableError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Message for the user. With `detailed`, candidate walks add their
 * per-dataflow summary.
 */
export function describeError(error: unknown, detailed = false): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (detailed && error instanceof CandidatesExhaustedError) {
    return `${error.message}\n${error.getSummary()}`;
  }
  return error.message;
}
