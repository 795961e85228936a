#!/usr/bin/env tsx
/**
 * unicef-data CLI Entry Point
 *
 * Fetch UNICEF indicators with dataflow fallback, and inspect the metadata
 * that drives resolution.
 *
 * @module unicef-data-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { UnicefDataClient } from '../src/client/unicef-data-client.js';
import { Logger, stderrSink } from '../src/core/utils/logger.js';
import { cacheReloadCommand, cacheStatusCommand } from '../src/cli/commands/cache.js';
import { fetchCommand } from '../src/cli/commands/fetch.js';
import { dataflowsCommand, infoCommand } from '../src/cli/commands/info.js';
import { resolveCommand } from '../src/cli/commands/resolve.js';
import { categoriesCommand, searchCommand } from '../src/cli/commands/search.js';
import { loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import type { CommandContext, CommandResult } from '../src/cli/lib/context.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { printOutput } from '../src/cli/lib/output.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  client: UnicefDataClient;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

// Ctrl-C aborts in-flight requests instead of killing the process mid-write
const interrupt = new AbortController();

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

function commandContext(): CommandContext {
  const { client, logger, config } = getGlobalContext();
  return { client, logger, verbose: config.verbose, signal: interrupt.signal };
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function initializeContext(options: {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  timeout?: number;
  concurrency?: number;
  retries?: number;
  metadataDir?: string;
  baseUrl?: string;
}): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
      concurrency: options.concurrency,
      maxRetries: options.retries,
      metadataDir: options.metadataDir,
      baseUrl: options.baseUrl,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  // Library diagnostics: warnings by default, everything with --verbose
  const client = new UnicefDataClient({
    config: config.client,
    logger: new Logger({
      level: config.verbose ? 'debug' : 'warn',
      service: 'unicef-data',
      pretty: !config.json,
      write: stderrSink,
    }),
  });

  globalContext = { config, logger, client, startTime };
  return globalContext;
}

/**
 * Print a command's output and set the process exit code
 */
function finish(result: CommandResult): void {
  if (result.output !== '') {
    printOutput(result.output);
  }
  process.exitCode = result.exitCode;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('unicef-data')
    .description('Fetch UNICEF SDMX indicators with automatic dataflow fallback')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Log as JSON lines (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .unicef-datarc)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseInteger)
    .option('--retries <n>', 'Retries per request on transient failure', parseInteger)
    .option('--concurrency <n>', 'Indicators fetched in parallel', parseInteger)
    .option('--metadata-dir <path>', 'Directory holding the metadata tables')
    .option('--base-url <url>', 'SDMX REST endpoint')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('fetch <indicators...>')
    .description('Fetch indicator data, falling back across dataflows')
    .option('--countries <codes>', 'ISO3 codes, comma separated')
    .option('--year <spec>', 'Year, range (2015:2023) or list (2015,2018)')
    .option('--sex <code>', 'Sex filter (F, M, _T)')
    .option('--filter <dim=codes>', 'Dimension filter, repeatable', collect, [])
    .option('--totals', 'Request _T totals in the query key')
    .option('--keep-disaggregations', 'Keep every breakdown instead of totals')
    .option('--dataflow <id>', 'Dataflow to try first')
    .option('--level <level>', 'Schema level: minimal|standard|extended|full')
    .option('--simplify', 'Only iso3, country, indicator, period, value')
    .option('--format <format>', 'long|wide|wide_indicators|wide_attributes', 'long')
    .option('--pivot <dims>', 'Pivot dimension(s) for wide_attributes')
    .option('--circa', 'Closest available period to each requested year')
    .option('--dropna', 'Drop rows without a value')
    .option('--mrv <n>', 'N most recent values per country', parseInteger)
    .option('--latest', 'Latest value per country')
    .option('--ignore-duplicates', 'Drop exact duplicate rows instead of failing')
    .option('--deadline <ms>', 'Per-indicator deadline in milliseconds', parseInteger)
    .option('--output <fmt>', 'Output format: csv|table|json|ndjson', 'csv')
    .action(async (indicators: string[], options) => {
      finish(await fetchCommand(commandContext(), indicators, options));
    });

  program
    .command('resolve <indicator>')
    .description('Show the dataflows that would be tried, in order')
    .option('--dataflow <id>', 'Dataflow to try first')
    .option('--output <fmt>', 'Output format: table|json', 'table')
    .action(async (indicator: string, options) => {
      finish(await resolveCommand(commandContext(), indicator, options));
    });

  program
    .command('search [query]')
    .description('Search indicators by code, name or description')
    .option('--category <name>', 'Restrict to a category or dataflow')
    .option('--limit <n>', 'Max results (0 for all)', parseInteger, 50)
    .option('--output <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (query: string | undefined, options) => {
      finish(await searchCommand(commandContext(), query, options));
    });

  program
    .command('categories')
    .description('Indicator counts per category')
    .option('--output <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (options) => {
      finish(await categoriesCommand(commandContext(), options));
    });

  program
    .command('info <indicator>')
    .description('Metadata for one indicator')
    .option('--output <fmt>', 'Output format: table|json', 'table')
    .action(async (indicator: string, options) => {
      finish(await infoCommand(commandContext(), indicator, options));
    });

  program
    .command('dataflows')
    .description('Dataflows with a known dimension layout')
    .option('--output <fmt>', 'Output format: table|json|ndjson|csv', 'table')
    .action(async (options) => {
      finish(await dataflowsCommand(commandContext(), options));
    });

  const cache = program.command('cache').description('Metadata cache');

  cache
    .command('status')
    .description('Where metadata came from and how old it is')
    .option('--output <fmt>', 'Output format: table|json', 'table')
    .action(async (options) => {
      finish(await cacheStatusCommand(commandContext(), options));
    });

  cache
    .command('reload')
    .description('Drop loaded metadata and read the tables again')
    .option('--output <fmt>', 'Output format: table|json', 'table')
    .action(async (options) => {
      finish(await cacheReloadCommand(commandContext(), options));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();
  process.once('SIGINT', () => interrupt.abort());

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
