/**
 * unicef-data CLI Configuration Management
 *
 * Loads configuration from .unicef-datarc (YAML or JSON) with environment
 * variable overrides and defaults from core/config.ts.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (UNICEF_DATA_*)
 * 3. Config file (.unicef-datarc, found by walking up from cwd, or --config path)
 * 4. Default values
 *
 * Example .unicef-datarc:
 *
 *   version: 1
 *   endpoint:
 *     base_url: https://sdmx.data.unicef.org/ws/public/sdmxapi/rest
 *   metadata:
 *     dir: ./metadata
 *     stale_after_days: 30
 *   http:
 *     timeout: 60000
 *     max_retries: 3
 *   defaults:
 *     concurrency: 4
 *     schema_level: extended
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { resolveClientConfig, type ClientConfig } from '../../core/config.js';
import { formatIssues } from '../../metadata/schemas.js';
import { SCHEMA_LEVELS, isSchemaLevel, type SchemaLevel } from '../../normalize/schema.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  /** Settings handed to UnicefDataClient */
  readonly client: ClientConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  endpoint: z
    .object({
      base_url: z.string().url().optional(),
      agency: z.string().min(1).optional(),
      version: z.coerce.string().optional(),
    })
    .optional(),
  metadata: z
    .object({
      dir: z.string().min(1).optional(),
      stale_after_days: PositiveInt.optional(),
    })
    .optional(),
  http: z
    .object({
      timeout: PositiveInt.optional(),
      max_retries: NonNegativeInt.optional(),
      initial_delay: NonNegativeInt.optional(),
      max_delay: NonNegativeInt.optional(),
      jitter: z.number().min(0).max(1).optional(),
      user_agent: z.string().min(1).optional(),
    })
    .optional(),
  pagination: z
    .object({
      page_size: PositiveInt.optional(),
      max_pages: PositiveInt.optional(),
    })
    .optional(),
  defaults: z
    .object({
      concurrency: PositiveInt.optional(),
      deadline: PositiveInt.nullable().optional(),
      schema_level: z.enum(['minimal', 'standard', 'extended', 'full']).optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.unicef-datarc',
  '.unicef-datarc.yaml',
  '.unicef-datarc.yml',
  '.unicef-datarc.json',
];

/**
 * Find config file in current directory or parent directories
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, so one parser covers every extension
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new Error(`Config file ${filePath} is not valid YAML or JSON`, { cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Get environment variable with prefix
 */
function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`UNICEF_DATA_${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

function getEnvSchemaLevel(env: Env): SchemaLevel | undefined {
  const value = getEnvVar(env, 'SCHEMA_LEVEL');
  if (value === undefined) return undefined;
  if (!isSchemaLevel(value)) {
    throw new Error(
      `Invalid UNICEF_DATA_SCHEMA_LEVEL: ${value}. Must be one of: ${SCHEMA_LEVELS.join(', ')}`
    );
  }
  return value;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    timeout?: number;
    concurrency?: number;
    maxRetries?: number;
    metadataDir?: string;
    baseUrl?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error when an explicit config file is missing or any file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    // Explicit config path provided
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  // Relative paths in a config file are relative to that file
  const fileBase = configPath ? dirname(configPath) : cwd;
  const metadataDir =
    overrides.metadataDir !== undefined
      ? resolve(cwd, overrides.metadataDir)
      : getEnvVar(env, 'METADATA_DIR') !== undefined
        ? resolve(cwd, getEnvVar(env, 'METADATA_DIR') ?? '')
        : fileConfig.metadata?.dir !== undefined
          ? resolve(fileBase, fileConfig.metadata.dir)
          : undefined;

  // Merge configuration layers; undefined fields fall through to the defaults
  const client = resolveClientConfig({
    endpoint: {
      baseUrl: overrides.baseUrl ?? getEnvVar(env, 'BASE_URL') ?? fileConfig.endpoint?.base_url,
      agency: fileConfig.endpoint?.agency,
      version: fileConfig.endpoint?.version,
    },
    pagination: {
      pageSize: fileConfig.pagination?.page_size,
      maxPages: fileConfig.pagination?.max_pages,
    },
    timeoutMs: overrides.timeout ?? getEnvNumber(env, 'TIMEOUT') ?? fileConfig.http?.timeout,
    maxRetries: overrides.maxRetries ?? getEnvNumber(env, 'MAX_RETRIES') ?? fileConfig.http?.max_retries,
    initialDelayMs: fileConfig.http?.initial_delay,
    maxDelayMs: fileConfig.http?.max_delay,
    jitterFactor: fileConfig.http?.jitter,
    userAgent: fileConfig.http?.user_agent,
    concurrency: overrides.concurrency ?? getEnvNumber(env, 'CONCURRENCY') ?? fileConfig.defaults?.concurrency,
    deadlineMs: getEnvNumber(env, 'DEADLINE') ?? fileConfig.defaults?.deadline,
    metadataDir,
    staleAfterDays: fileConfig.metadata?.stale_after_days,
    schemaLevel: getEnvSchemaLevel(env) ?? fileConfig.defaults?.schema_level,
  });

  const config: CLIConfig = {
    version: fileConfig.version ?? 1,
    client,
    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.client.timeoutMs <= 0) {
    throw new Error('Timeout must be a positive number');
  }

  if (config.client.concurrency <= 0 || config.client.concurrency > 32) {
    throw new Error('Concurrency must be between 1 and 32');
  }

  if (config.client.maxRetries < 0) {
    throw new Error('Max retries must not be negative');
  }
}
