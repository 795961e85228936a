/**
 * Exit code mapping tests
 */

import { describe, it, expect } from 'vitest';
import { describeError, EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import {
  DeadlineExceededError,
  DuplicateRowsError,
  FetchCancelledError,
  InvalidQueryError,
  MetadataUnavailableError,
  NotFoundAllCandidatesError,
  PaginationOverflowError,
  TransientExhaustedError,
} from '../../../core/errors.js';

describe('exitCodeFor', () => {
  it('maps error classes to exit codes', () => {
    expect(exitCodeFor(new FetchCancelledError())).toBe(EXIT_CODES.USER_CANCELLED);
    expect(exitCodeFor(new TransientExhaustedError('CME_MRY0T4', ['CME'], []))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new DeadlineExceededError('CME_MRY0T4', 100, []))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new DuplicateRowsError(2))).toBe(EXIT_CODES.DATA_INTEGRITY_ERROR);
    expect(exitCodeFor(new PaginationOverflowError('https://sdmx.test/data', 2, 10))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeFor(new MetadataUnavailableError('/tmp/meta', 'missing'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new InvalidQueryError('bad'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERRORS);
  });
});

describe('describeError', () => {
  const error = new NotFoundAllCandidatesError('CME_MRY0T4', ['CME', 'GLOBAL_DATAFLOW'], [
    { dataflow: 'CME', outcome: 'not-found', detail: 'HTTP 404' },
    { dataflow: 'GLOBAL_DATAFLOW', outcome: 'empty', detail: 'no rows' },
  ]);

  it('adds the per-dataflow summary when detailed', () => {
    expect(describeError(error)).toBe(error.message);
    expect(describeError(error, true)).toBe(
      [
        error.message,
        "Indicator 'CME_MRY0T4': 2 dataflows tried",
        '  CME: not-found (HTTP 404)',
        '  GLOBAL_DATAFLOW: empty (no rows)',
      ].join('\n')
    );
  });

  it('stringifies non-errors', () => {
    expect(describeError('boom', true)).toBe('boom');
  });
});
