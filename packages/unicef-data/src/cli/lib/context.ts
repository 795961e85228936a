/**
 * Shared command plumbing
 *
 * @module cli/lib/context
 */

import type { UnicefDataClient } from '../../client/unicef-data-client.js';
import { InvalidQueryError } from '../../core/errors.js';
import { describeError, EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js';
import type { CLILogger } from './logger.js';
import { isCliOutputFormat, type OutputFormat, type OutputRow } from './output.js';

export interface CommandContext {
  readonly client: UnicefDataClient;
  readonly logger: CLILogger;
  readonly verbose?: boolean;
  readonly signal?: AbortSignal;
}

/**
 * What every command returns; the entry point prints `output` and exits
 * with `exitCode`
 */
export interface CommandResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly output: string;
  readonly error?: string;
}

export function failure(context: CommandContext, error: unknown): CommandResult {
  const message = describeError(error, context.verbose === true);
  context.logger.error(message);
  return { success: false, exitCode: exitCodeFor(error), output: '', error: message };
}

/**
 * Completed command; `exitCode` may still be WARNINGS for partial results
 */
export function success(output: string, exitCode: ExitCode = EXIT_CODES.SUCCESS): CommandResult {
  return { success: true, exitCode, output };
}

export function parseOutputFormat(value: string | undefined, fallback: OutputFormat): OutputFormat {
  if (value === undefined) {
    return fallback;
  }
  const format = value.toLowerCase();
  if (!isCliOutputFormat(format)) {
    throw new InvalidQueryError(`Unknown output format: ${value}`, ['Use table, json, ndjson or csv']);
  }
  return format;
}

/**
 * Plain row view of a typed record
 */
export function toRow(record: object): OutputRow {
  return Object.fromEntries(Object.entries(record));
}
