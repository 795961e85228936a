/**
 * Cache Commands
 *
 * Usage:
 *   unicef-data cache status
 *   unicef-data cache reload
 *
 * `reload` drops the loaded metadata and reads the tables again.
 *
 * @module cli/commands/cache
 */

import type { MetadataStatus } from '../../metadata/registry.js';
import { failure, parseOutputFormat, success, type CommandContext, type CommandResult } from '../lib/context.js';
import { EXIT_CODES } from '../lib/exit-codes.js';
import { formatJson } from '../lib/output.js';

export interface CacheCommandResult extends CommandResult {
  readonly status: MetadataStatus | null;
}

function renderStatus(status: MetadataStatus): string {
  const lines = [
    `Directory:   ${status.directory}`,
    `Source:      ${status.source ?? 'not loaded'}`,
    `Indicators:  ${status.indicators}`,
    `Synced:      ${status.syncedAt ?? 'unknown'}`,
    `Age (days):  ${status.ageDays ?? '-'}`,
    `Stale:       ${status.stale ? 'yes' : 'no'}`,
  ];
  for (const error of status.errors) {
    lines.push(`Problem:     ${error}`);
  }
  return lines.join('\n');
}

async function report(
  context: CommandContext,
  load: () => Promise<unknown>,
  options: { output?: string }
): Promise<CacheCommandResult> {
  try {
    const format = parseOutputFormat(options.output, 'table');
    await load();
    const status = context.client.metadataStatus();
    const output = format === 'json' ? formatJson(status) : renderStatus(status);
    const exitCode = status.stale || status.errors.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
    return { ...success(output, exitCode), status };
  } catch (error) {
    return { ...failure(context, error), status: null };
  }
}

export function cacheStatusCommand(
  context: CommandContext,
  options: { output?: string } = {}
): Promise<CacheCommandResult> {
  return report(context, () => context.client.metadata(), options);
}

export function cacheReloadCommand(
  context: CommandContext,
  options: { output?: string } = {}
): Promise<CacheCommandResult> {
  return report(
    context,
    () => {
      context.client.clearCache();
      return context.client.reload();
    },
    options
  );
}
