/**
 * Resolve Command
 *
 * Show which dataflows would be tried for an indicator, in order, and which
 * resolution tier produced them. Makes no network calls.
 *
 * Usage:
 *   unicef-data resolve <indicator> [--dataflow <id>] [--output table|json]
 *
 * @module cli/commands/resolve
 */

import { failure, parseOutputFormat, success, type CommandContext, type CommandResult } from '../lib/context.js';
import { formatJson, formatTable } from '../lib/output.js';

export interface ResolveCommandOptions {
  dataflow?: string;
  output?: string;
}

export interface ResolveCommandResult extends CommandResult {
  readonly candidates: readonly string[];
}

export async function resolveCommand(
  context: CommandContext,
  indicator: string,
  options: ResolveCommandOptions = {}
): Promise<ResolveCommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    const resolution = await context.client.resolve(indicator, { preferred: options.dataflow });

    const output =
      format === 'json' || format === 'ndjson'
        ? formatJson(resolution, format === 'json')
        : [
            `Indicator: ${resolution.indicatorCode}`,
            `Tier:      ${resolution.tier}`,
            `Prefix:    ${resolution.prefix}`,
            '',
            formatTable(
              resolution.candidates.map((dataflow, i) => ({ order: i + 1, dataflow })),
              [
                { key: 'order', header: '#', align: 'right' },
                { key: 'dataflow', header: 'Dataflow' },
              ]
            ),
          ].join('\n');

    return { ...success(output), candidates: resolution.candidates };
  } catch (error) {
    return { ...failure(context, error), candidates: [] };
  }
}
