/**
 * Metadata loader
 *
 * Reads the YAML tables from a metadata directory. A missing or invalid file
 * never aborts the load: the failure is logged, recorded in the report as a
 * MetadataUnavailableError, and the affected table falls back to the
 * built-in defaults (or stays empty where there is no default).
 *
 * @module metadata/loader
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

import { MetadataUnavailableError, toError } from '../core/errors.js';
import type { DataflowSchema, IndicatorEntry, IndicatorTier } from '../core/types.js';
import { logger as rootLogger, type Logger } from '../core/utils/logger.js';
import { DEFAULT_FALLBACK_SEQUENCES } from './defaults.js';
import {
  CountriesFileSchema,
  DataflowFileSchema,
  DataflowOverridesFileSchema,
  FallbackSequencesFileSchema,
  IndicatorsFileSchema,
  RegionsFileSchema,
  formatIssues,
  type DataflowFile,
  type IndicatorRecord,
} from './schemas.js';
import { MetadataStore, type MetadataSource } from './store.js';

export const METADATA_FILES = {
  indicators: '_unicefdata_indicators_metadata.yaml',
  fallbackSequences: '_dataflow_fallback_sequences.yaml',
  overrides: '_dataflow_overrides.yaml',
  countries: '_unicefdata_countries.yaml',
  regions: '_unicefdata_regions.yaml',
  dataflowsDir: 'dataflows',
} as const;

export interface MetadataLoadReport {
  readonly store: MetadataStore;
  readonly directory: string;
  readonly loadedFiles: readonly string[];
  readonly errors: readonly MetadataUnavailableError[];
}

export interface LoadMetadataOptions {
  readonly logger?: Logger;
  readonly now?: Date;
}

type ReadResult<T> =
  | { readonly ok: true; readonly data: T; readonly modifiedAt: Date }
  | { readonly ok: false; readonly error: MetadataUnavailableError };

const TIER_BY_NUMBER: Readonly<Record<number, IndicatorTier>> = {
  1: 'verified',
  2: 'limited_or_deprecated',
  3: 'no_data',
  4: 'orphan',
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readYamlFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<ReadResult<T>> {
  let content: string;
  let modifiedAt: Date;
  try {
    content = await readFile(path, 'utf-8');
    modifiedAt = (await stat(path)).mtime;
  } catch (error) {
    const reason = isMissingFile(error) ? 'file not found' : toError(error).message;
    return { ok: false, error: new MetadataUnavailableError(path, reason, { cause: error }) };
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    return {
      ok: false,
      error: new MetadataUnavailableError(path, `invalid YAML: ${toError(error).message}`, {
        cause: error,
      }),
    };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: new MetadataUnavailableError(path, formatIssues(parsed.error), { cause: parsed.error }),
    };
  }

  return { ok: true, data: parsed.data, modifiedAt };
}

function toList(value: string | readonly string[] | null | undefined): string[] {
  if (value === null || value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

function dedupe(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (value && !seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }
  return result;
}

/**
 * Convert one YAML indicator record into an IndicatorEntry
 *
 * `dataflow` wins over `dataflows` when both are present. A known override
 * is placed ahead of the recorded dataflows.
 */
export function toIndicatorEntry(
  code: string,
  record: IndicatorRecord,
  override?: string
): IndicatorEntry {
  const recorded = toList(record.dataflow ?? record.dataflows);
  const tier: IndicatorTier =
    record.tier === undefined
      ? 'verified'
      : typeof record.tier === 'number'
        ? (TIER_BY_NUMBER[record.tier] ?? 'verified')
        : record.tier;

  return {
    code,
    name: record.name ?? code,
    directDataflows: dedupe(override ? [override, ...recorded] : recorded),
    tier,
    ...(record.tier_reason ? { tierReason: record.tier_reason } : {}),
    disaggregations: dedupe((record.disaggregations ?? []).map((d) => d.toUpperCase())),
    disaggregationsWithTotals: dedupe(
      (record.disaggregations_with_totals ?? []).map((d) => d.toUpperCase())
    ),
    ...(record.category ? { category: record.category } : {}),
    ...(record.description ? { description: record.description } : {}),
  };
}

export function toDataflowSchema(file: DataflowFile): DataflowSchema {
  return {
    id: file.id,
    ...(file.name ? { name: file.name } : {}),
    agency: file.agency,
    version: file.version,
    dimensions: [...file.dimensions]
      .sort((a, b) => a.position - b.position)
      .map((dim) => ({
        id: dim.id,
        position: dim.position,
        ...(dim.codelist ? { codelist: dim.codelist } : {}),
        ...(dim.values ? { values: dim.values } : {}),
      })),
    timeDimension: file.time_dimension,
    primaryMeasure: file.primary_measure,
    attributes: file.attributes.map((attr) => ({
      id: attr.id,
      ...(attr.codelist ? { codelist: attr.codelist } : {}),
    })),
  };
}

function parseSyncedAt(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

async function loadDataflowSchemas(
  dir: string,
  errors: MetadataUnavailableError[],
  loadedFiles: string[]
): Promise<DataflowSchema[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    errors.push(
      new MetadataUnavailableError(
        dir,
        isMissingFile(error) ? 'directory not found' : toError(error).message,
        { cause: error }
      )
    );
    return [];
  }

  const schemas: DataflowSchema[] = [];
  for (const name of names.filter((n) => n.endsWith('.yaml') || n.endsWith('.yml')).sort()) {
    const path = join(dir, name);
    const result = await readYamlFile(path, DataflowFileSchema);
    if (result.ok) {
      schemas.push(toDataflowSchema(result.data));
      loadedFiles.push(path);
    } else {
      errors.push(result.error);
    }
  }
  return schemas;
}

/**
 * Load every metadata table from `directory`
 */
export async function loadMetadata(
  directory: string,
  options: LoadMetadataOptions = {}
): Promise<MetadataLoadReport> {
  const log = options.logger ?? rootLogger.child('metadata');
  const errors: MetadataUnavailableError[] = [];
  const loadedFiles: string[] = [];

  const [indicatorsFile, sequencesFile, overridesFile, countriesFile, regionsFile] =
    await Promise.all([
      readYamlFile(join(directory, METADATA_FILES.indicators), IndicatorsFileSchema),
      readYamlFile(join(directory, METADATA_FILES.fallbackSequences), FallbackSequencesFileSchema),
      readYamlFile(join(directory, METADATA_FILES.overrides), DataflowOverridesFileSchema),
      readYamlFile(join(directory, METADATA_FILES.countries), CountriesFileSchema),
      readYamlFile(join(directory, METADATA_FILES.regions), RegionsFileSchema),
    ]);

  const collect = <T>(result: ReadResult<T>, name: string): T | undefined => {
    if (result.ok) {
      loadedFiles.push(join(directory, name));
      return result.data;
    }
    errors.push(result.error);
    return undefined;
  };

  const indicators = collect(indicatorsFile, METADATA_FILES.indicators);
  const sequences = collect(sequencesFile, METADATA_FILES.fallbackSequences);
  const overrides = collect(overridesFile, METADATA_FILES.overrides)?.overrides ?? {};
  const countries = collect(countriesFile, METADATA_FILES.countries)?.countries ?? {};
  const regions = collect(regionsFile, METADATA_FILES.regions)?.regions ?? {};
  const dataflows = await loadDataflowSchemas(
    join(directory, METADATA_FILES.dataflowsDir),
    errors,
    loadedFiles
  );

  const entries: IndicatorEntry[] = [];
  for (const [code, record] of Object.entries(indicators?.indicators ?? {})) {
    entries.push(toIndicatorEntry(code, record, overrides[code]));
  }
  // Overrides for indicators the table does not list still resolve directly
  for (const [code, dataflow] of Object.entries(overrides)) {
    if (!indicators?.indicators[code]) {
      entries.push(toIndicatorEntry(code, { dataflow }));
    }
  }

  const source: MetadataSource =
    errors.length === 0 ? 'files' : !indicators && !sequences ? 'defaults' : 'mixed';

  for (const error of errors) {
    log.warn('Metadata table unavailable, using defaults', {
      path: error.path,
      reason: error.message,
    });
  }

  const syncedAt =
    parseSyncedAt(indicators?._metadata?.synced_at) ??
    (indicatorsFile.ok ? indicatorsFile.modifiedAt : null);

  const store = MetadataStore.create({
    indicators: entries,
    fallbackSequences: sequences?.fallback_sequences ?? DEFAULT_FALLBACK_SEQUENCES,
    dataflows,
    countries,
    regions,
    syncedAt,
    loadedAt: options.now ?? new Date(),
    version: indicators?._metadata?.version ?? null,
    source,
  });

  log.debug('Metadata loaded', {
    directory,
    indicators: store.indicatorCount,
    dataflows: dataflows.length,
    errors: errors.length,
  });

  return { store, directory, loadedFiles, errors };
}
