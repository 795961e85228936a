/**
 * Fetch Command
 *
 * Fetch one or more indicators with dataflow fallback and write the result.
 *
 * Usage:
 *   unicef-data fetch <indicators...> [options]
 *
 * Options:
 *   --countries <codes>     ISO3 codes, comma separated (default: all)
 *   --year <spec>           2020 | 2015:2023 | 2015,2018,2020
 *   --sex <code>            SEX filter (e.g. F, M, _T)
 *   --filter <dim=codes>    Dimension filter, repeatable (codes joined with +)
 *   --totals                Put _T defaults into the query key
 *   --keep-disaggregations  Do not default breakdowns to their totals
 *   --dataflow <id>         Try this dataflow first
 *   --level <level>         minimal|standard|extended|full
 *   --simplify              Same as --level minimal
 *   --format <format>       long|wide|wide_indicators|wide_attributes
 *   --pivot <dims>          Pivot dimension(s) for wide_attributes, comma separated
 *   --circa                 Closest period to each requested year
 *   --dropna                Drop rows without a value
 *   --mrv <n>               N most recent values per country
 *   --latest                Latest value per country
 *   --ignore-duplicates     Drop exact duplicate rows instead of failing
 *   --deadline <ms>         Per-indicator deadline
 *   --output <fmt>          csv|table|json|ndjson (default: csv)
 *
 * @module cli/commands/fetch
 */

import {
  isOutputFormat,
  type FetchRequest,
  type FetchResult,
  type IndicatorFailure,
  type IndicatorSummary,
} from '../../client/unicef-data-client.js';
import { InvalidQueryError } from '../../core/errors.js';
import { columnsFor, isSchemaLevel, SCHEMA_LEVELS, type SchemaLevel } from '../../normalize/schema.js';
import { isPivotDimension, PIVOT_DIMENSIONS, type PivotDimension } from '../../transform/wide.js';
import { failure, parseOutputFormat, success, toRow, type CommandContext, type CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/exit-codes.js';
import { columnsFromKeys, formatJson, formatOutput, type OutputFormat as CliOutputFormat, type OutputRow } from '../lib/output.js';

export interface FetchCommandOptions {
  countries?: string;
  year?: string;
  sex?: string;
  filter?: string[];
  totals?: boolean;
  keepDisaggregations?: boolean;
  dataflow?: string;
  level?: string;
  simplify?: boolean;
  format?: string;
  pivot?: string;
  circa?: boolean;
  dropna?: boolean;
  mrv?: number;
  latest?: boolean;
  ignoreDuplicates?: boolean;
  deadline?: number;
  output?: string;
}

export interface FetchCommandResult extends CommandResult {
  readonly rows: number;
  readonly indicators: readonly IndicatorSummary[];
  readonly failures: readonly IndicatorFailure[];
}

function splitList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

/**
 * `SEX=F`, `WEALTH_QUINTILE=Q1+Q5` -> { SEX: ['F'], WEALTH_QUINTILE: ['Q1', 'Q5'] }
 */
export function parseFilters(entries: readonly string[]): Record<string, string[]> {
  const filters: Record<string, string[]> = {};
  for (const entry of entries) {
    const match = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+?)\s*$/.exec(entry);
    if (!match?.[1] || !match[2]) {
      throw new InvalidQueryError(`Invalid filter: ${entry}`, ['Expected DIMENSION=CODE[+CODE...]']);
    }
    const dimension = match[1].toUpperCase();
    const codes = match[2].split(/[+,]/).map((code) => code.trim()).filter((code) => code !== '');
    filters[dimension] = [...(filters[dimension] ?? []), ...codes];
  }
  return filters;
}

function parseLevel(options: FetchCommandOptions): SchemaLevel | undefined {
  if (options.simplify) {
    return 'minimal';
  }
  if (options.level === undefined) {
    return undefined;
  }
  const level = options.level.toLowerCase();
  if (!isSchemaLevel(level)) {
    throw new InvalidQueryError(`Unknown schema level: ${options.level}`, [
      `Use one of: ${SCHEMA_LEVELS.join(', ')}`,
    ]);
  }
  return level;
}

function parsePivot(value: string | undefined): PivotDimension[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return splitList(value.toLowerCase()).map((dimension) => {
    if (!isPivotDimension(dimension)) {
      throw new InvalidQueryError(`Unknown pivot dimension: ${dimension}`, [
        `Use one of: ${PIVOT_DIMENSIONS.join(', ')}`,
      ]);
    }
    return dimension;
  });
}

/**
 * Translate command options into a client request
 */
export function toFetchRequest(options: FetchCommandOptions, signal?: AbortSignal): FetchRequest {
  const format = options.format?.toLowerCase();
  if (format !== undefined && !isOutputFormat(format)) {
    throw new InvalidQueryError(`Unknown format: ${options.format}`, [
      'Use long, wide, wide_indicators or wide_attributes',
    ]);
  }
  if (options.mrv !== undefined && (!Number.isInteger(options.mrv) || options.mrv < 1)) {
    throw new InvalidQueryError('--mrv must be a positive integer');
  }

  return {
    countries: options.countries === undefined ? undefined : splitList(options.countries),
    year: options.year,
    sex: options.sex,
    filters: parseFilters(options.filter ?? []),
    totals: options.totals,
    keepDisaggregations: options.keepDisaggregations,
    dataflow: options.dataflow,
    level: parseLevel(options),
    format,
    pivot: parsePivot(options.pivot),
    circa: options.circa,
    dropna: options.dropna,
    mrv: options.mrv,
    latest: options.latest,
    ignoreDuplicates: options.ignoreDuplicates,
    deadlineMs: options.deadline,
    signal,
  };
}

function renderResult(result: FetchResult<SchemaLevel>, outputFormat: CliOutputFormat): { output: string; rows: number } {

  if (result.table) {
    const rows: OutputRow[] = result.table.rows.map(toRow);
    const output =
      outputFormat === 'json'
        ? formatJson({ columns: result.table.columns, rows })
        : formatOutput(rows, outputFormat, columnsFromKeys(result.table.columns));
    return { output, rows: rows.length };
  }

  const rows = result.records.map(toRow);
  return {
    output: formatOutput(rows, outputFormat, columnsFromKeys(columnsFor(result.level))),
    rows: rows.length,
  };
}

/**
 * Execute the fetch command
 */
export async function fetchCommand(
  context: CommandContext,
  indicators: readonly string[],
  options: FetchCommandOptions = {}
): Promise<FetchCommandResult> {
  context.logger.commandStart('fetch', { indicators: [...indicators] });

  try {
    const request = toFetchRequest(options, context.signal);
    const outputFormat = parseOutputFormat(options.output, 'csv');
    const result = await context.client.fetch(indicators.flatMap(splitList), request);
    const { output, rows } = renderResult(result, outputFormat);

    for (const summary of result.indicators) {
      context.logger.info('Fetched indicator', {
        indicator: summary.indicatorCode,
        dataflow: summary.dataflow,
        rows: summary.rows,
        ...(summary.tried.length > 1 ? { tried: summary.tried.join(', ') } : {}),
      });
    }
    for (const failed of result.failures) {
      context.logger.warn(`Indicator ${failed.indicatorCode} failed: ${failed.error.message}`);
    }

    const exitCode = result.failures.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
    context.logger.commandEnd(true, { rows });
    return {
      ...success(output, exitCode),
      rows,
      indicators: result.indicators,
      failures: result.failures,
    };
  } catch (error) {
    context.logger.commandEnd(false);
    return { ...failure(context, error), rows: 0, indicators: [], failures: [] };
  }
}
