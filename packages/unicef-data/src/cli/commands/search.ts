/**
 * Search Commands
 *
 * Usage:
 *   unicef-data search [query] [--category <name>] [--limit <n>] [--output <fmt>]
 *   unicef-data categories [--output <fmt>]
 *
 * @module cli/commands/search
 */

import { failure, parseOutputFormat, success, toRow, type CommandContext, type CommandResult } from '../lib/context.js';
import { formatters, formatJson, formatOutput, type TableColumn } from '../lib/output.js';

export interface SearchCommandOptions {
  category?: string;
  limit?: number;
  output?: string;
}

export interface SearchCommandResult extends CommandResult {
  readonly total: number;
}

const SEARCH_COLUMNS: TableColumn[] = [
  { key: 'code', header: 'Code' },
  { key: 'category', header: 'Category' },
  { key: 'name', header: 'Name', width: 50, formatter: formatters.truncate(50) },
];

const CATEGORY_COLUMNS: TableColumn[] = [
  { key: 'category', header: 'Category' },
  { key: 'count', header: 'Count', align: 'right' },
];

export async function searchCommand(
  context: CommandContext,
  query: string | undefined,
  options: SearchCommandOptions = {}
): Promise<SearchCommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    const limit = options.limit ?? 50;
    const result = await context.client.search({ query, category: options.category, limit });

    if (format === 'json') {
      return { ...success(formatJson(result)), total: result.total };
    }

    let output = formatOutput(result.matches.map(toRow), format, SEARCH_COLUMNS);
    if (format === 'table' && result.total > result.matches.length) {
      output += `\n\nShowing ${result.matches.length} of ${result.total} matches (use --limit 0 for all)`;
    }
    return { ...success(output), total: result.total };
  } catch (error) {
    return { ...failure(context, error), total: 0 };
  }
}

export async function categoriesCommand(
  context: CommandContext,
  options: Pick<SearchCommandOptions, 'output'> = {}
): Promise<SearchCommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    const categories = await context.client.categories();
    const total = categories.reduce((sum, entry) => sum + entry.count, 0);

    if (format === 'json') {
      return { ...success(formatJson(categories)), total };
    }
    let output = formatOutput(categories.map(toRow), format, CATEGORY_COLUMNS);
    if (format === 'table') {
      output += `\n\n${total} indicators in ${categories.length} categories`;
    }
    return { ...success(output), total };
  } catch (error) {
    return { ...failure(context, error), total: 0 };
  }
}
