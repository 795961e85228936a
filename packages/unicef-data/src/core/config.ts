/**
 * Client configuration
 *
 * Defaults for the SDMX endpoint, retry/timeout policy, pagination limits
 * and the metadata directory. The CLI layers a config file, environment
 * variables and flags on top of these (see cli/lib/config.ts).
 *
 * @module core/config
 */

import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_HTTP_CONFIG } from './http-client.js';
import type { SchemaLevel } from '../normalize/schema.js';

export interface SdmxEndpointConfig {
  readonly baseUrl: string;
  readonly agency: string;
  readonly version: string;
}

export interface PaginationConfig {
  /** Rows requested per continuation page (default: 100000) */
  readonly pageSize: number;
  /** Hard ceiling; reaching it is a fatal error, never truncation (default: 50) */
  readonly maxPages: number;
}

export interface ClientConfig {
  readonly endpoint: SdmxEndpointConfig;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterFactor: number;
  readonly pagination: PaginationConfig;
  /** Aggregate deadline for one indicator's fallback walk; null = unbounded */
  readonly deadlineMs: number | null;
  /** Parallel indicator walks in a batch */
  readonly concurrency: number;
  readonly metadataDir: string;
  /** Age after which loaded metadata triggers a refresh warning */
  readonly staleAfterDays: number;
  readonly schemaLevel: SchemaLevel;
  readonly userAgent: string;
}

/**
 * Metadata bundled with the package (packages/unicef-data/metadata)
 */
export const BUNDLED_METADATA_DIR = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'metadata'
);

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  endpoint: {
    baseUrl: 'https://sdmx.data.unicef.org/ws/public/sdmxapi/rest',
    agency: 'UNICEF',
    version: '1.0',
  },
  timeoutMs: DEFAULT_HTTP_CONFIG.timeoutMs,
  maxRetries: DEFAULT_HTTP_CONFIG.maxRetries,
  initialDelayMs: DEFAULT_HTTP_CONFIG.initialDelayMs,
  maxDelayMs: DEFAULT_HTTP_CONFIG.maxDelayMs,
  jitterFactor: DEFAULT_HTTP_CONFIG.jitterFactor,
  pagination: {
    pageSize: 100000,
    maxPages: 50,
  },
  deadlineMs: null,
  concurrency: 4,
  metadataDir: BUNDLED_METADATA_DIR,
  staleAfterDays: 30,
  schemaLevel: 'extended',
  userAgent: DEFAULT_HTTP_CONFIG.userAgent,
};

export type ClientConfigOverrides = Partial<
  Omit<ClientConfig, 'endpoint' | 'pagination'>
> & {
  readonly endpoint?: Partial<SdmxEndpointConfig>;
  readonly pagination?: Partial<PaginationConfig>;
};

/**
 * Merge overrides onto the defaults. Undefined fields keep the default;
 * `deadlineMs: null` explicitly removes the deadline.
 */
export function resolveClientConfig(overrides: ClientConfigOverrides = {}): ClientConfig {
  const defaults = DEFAULT_CLIENT_CONFIG;
  return {
    endpoint: {
      baseUrl: overrides.endpoint?.baseUrl ?? defaults.endpoint.baseUrl,
      agency: overrides.endpoint?.agency ?? defaults.endpoint.agency,
      version: overrides.endpoint?.version ?? defaults.endpoint.version,
    },
    timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
    maxRetries: overrides.maxRetries ?? defaults.maxRetries,
    initialDelayMs: overrides.initialDelayMs ?? defaults.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? defaults.maxDelayMs,
    jitterFactor: overrides.jitterFactor ?? defaults.jitterFactor,
    pagination: {
      pageSize: overrides.pagination?.pageSize ?? defaults.pagination.pageSize,
      maxPages: overrides.pagination?.maxPages ?? defaults.pagination.maxPages,
    },
    deadlineMs: overrides.deadlineMs !== undefined ? overrides.deadlineMs : defaults.deadlineMs,
    concurrency: overrides.concurrency ?? defaults.concurrency,
    metadataDir: overrides.metadataDir ?? defaults.metadataDir,
    staleAfterDays: overrides.staleAfterDays ?? defaults.staleAfterDays,
    schemaLevel: overrides.schemaLevel ?? defaults.schemaLevel,
    userAgent: overrides.userAgent ?? defaults.userAgent,
  };
}
