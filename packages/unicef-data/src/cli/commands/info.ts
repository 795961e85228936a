/**
 * Metadata inspection commands
 *
 * Usage:
 *   unicef-data info <indicator>
 *   unicef-data dataflows [--output <fmt>]
 *
 * @module cli/commands/info
 */

import { InvalidQueryError } from '../../core/errors.js';
import { failure, parseOutputFormat, success, type CommandContext, type CommandResult } from '../lib/context.js';
import { formatters, formatJson, formatOutput, type TableColumn } from '../lib/output.js';

const DATAFLOW_COLUMNS: TableColumn[] = [
  { key: 'id', header: 'Dataflow' },
  { key: 'version', header: 'Version' },
  { key: 'dimensions', header: 'Dimensions', formatter: formatters.list },
  { key: 'name', header: 'Name', width: 40, formatter: formatters.truncate(40) },
];

export async function infoCommand(
  context: CommandContext,
  indicator: string,
  options: { output?: string } = {}
): Promise<CommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    const entry = await context.client.indicatorInfo(indicator);
    const resolution = await context.client.resolve(indicator);

    if (!entry) {
      throw new InvalidQueryError(`Unknown indicator: ${indicator}`, [
        `Not in metadata; would try: ${resolution.candidates.join(', ')}`,
      ]);
    }

    if (format === 'json') {
      return success(formatJson({ ...entry, candidates: resolution.candidates }));
    }

    const lines = [
      `Code:         ${entry.code}`,
      `Name:         ${entry.name}`,
      `Category:     ${entry.category ?? '-'}`,
      `Dataflows:    ${entry.directDataflows.join(', ') || '-'}`,
      `Tier:         ${entry.tier}${entry.tierReason ? ` (${entry.tierReason})` : ''}`,
      `Breakdowns:   ${entry.disaggregations.join(', ') || '-'}`,
      `With totals:  ${entry.disaggregationsWithTotals.join(', ') || '-'}`,
      `Will try:     ${resolution.candidates.join(' -> ')}`,
    ];
    if (entry.description) {
      lines.push('', entry.description);
    }
    return success(lines.join('\n'));
  } catch (error) {
    return failure(context, error);
  }
}

export async function dataflowsCommand(
  context: CommandContext,
  options: { output?: string } = {}
): Promise<CommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    const dataflows = await context.client.dataflows();
    const rows = dataflows.map((schema) => ({
      id: schema.id,
      version: schema.version,
      dimensions: schema.dimensions.map((dimension) => dimension.id),
      name: schema.name ?? '',
    }));
    return success(format === 'json' ? formatJson(dataflows) : formatOutput(rows, format, DATAFLOW_COLUMNS));
  } catch (error) {
    return failure(context, error);
  }
}
