/**
 * Response Normalizer
 *
 * Turns raw CSV rows from whichever dataflow answered into canonical
 * records: renamed columns, typed cells, total defaults, enrichment from
 * metadata, caller-side country filtering, stable ordering and finally the
 * projection for the requested schema level.
 *
 * Pure: output depends only on the arguments.
 *
 * @module normalize/normalizer
 */

import type { IndicatorEntry, RawRecord } from '../core/types.js';
import { canonicalColumnFor, DISAGGREGATION_COLUMNS, type DisaggregationColumn } from './columns.js';
import { parseNumber, parsePeriod } from './period.js';
import { projectRecord, type CanonicalColumn, type CanonicalRecord, type FullRecord, type SchemaLevel } from './schema.js';
import { applyTotalDefaults } from './totals.js';

/**
 * Metadata lookups used for enrichment. MetadataStore satisfies this.
 */
export interface NormalizeLookups {
  countryName(iso3: string): string | undefined;
  isAggregate(code: string): boolean;
  readonly hasRegionCodes: boolean;
}

export interface NormalizeContext<L extends SchemaLevel> {
  readonly level: L;
  readonly dataflow: string;
  readonly indicator?: IndicatorEntry;
  readonly lookups?: NormalizeLookups;
  /** Upper-case dimension id -> allowed codes */
  readonly filters?: Readonly<Record<string, readonly string[]>>;
  readonly countries?: readonly string[] | 'all';
  /** Default-filter disaggregations to their totals (default true) */
  readonly applyTotals?: boolean;
}

export interface NormalizeResult<L extends SchemaLevel> {
  readonly records: CanonicalRecord<L>[];
  /** Disaggregation column -> code kept by default */
  readonly defaultsApplied: ReadonlyMap<DisaggregationColumn, string>;
  readonly droppedRows: number;
}

type Cells = ReadonlyMap<CanonicalColumn, string>;

function collectCells(row: RawRecord): Cells {
  const cells = new Map<CanonicalColumn, string>();
  for (const [header, raw] of Object.entries(row)) {
    const column = canonicalColumnFor(header.trim());
    const value = raw.trim();
    if (column === undefined || value === '' || cells.has(column)) {
      continue;
    }
    cells.set(column, value);
  }
  return cells;
}

function buildRecord<L extends SchemaLevel>(cells: Cells, context: NormalizeContext<L>): FullRecord {
  const text = (column: CanonicalColumn): string | null => cells.get(column) ?? null;
  const { lookups, indicator } = context;

  const iso3 = text('iso3')?.toUpperCase() ?? null;
  const indicatorCode = text('indicator');

  let geoType = parseNumber(text('geo_type'));
  if (iso3 !== null && lookups?.hasRegionCodes) {
    geoType = lookups.isAggregate(iso3) ? 1 : 0;
  }

  let indicatorName = text('indicator_name');
  if (indicatorName === null && indicator && (indicatorCode === null || indicatorCode === indicator.code)) {
    indicatorName = indicator.name;
  }

  return {
    iso3,
    country: text('country') ?? (iso3 !== null ? lookups?.countryName(iso3) ?? null : null),
    period: parsePeriod(text('period')),
    geo_type: geoType,
    indicator: indicatorCode ?? indicator?.code ?? null,
    indicator_name: indicatorName,
    value: parseNumber(text('value')),
    unit: text('unit'),
    unit_name: text('unit_name'),
    sex: text('sex'),
    sex_name: text('sex_name'),
    age: text('age'),
    wealth_quintile: text('wealth_quintile'),
    wealth_quintile_name: text('wealth_quintile_name'),
    residence: text('residence'),
    maternal_edu_lvl: text('maternal_edu_lvl'),
    lower_bound: parseNumber(text('lower_bound')),
    upper_bound: parseNumber(text('upper_bound')),
    obs_status: text('obs_status'),
    obs_status_name: text('obs_status_name'),
    data_source: text('data_source'),
    ref_period: text('ref_period'),
    country_notes: text('country_notes'),
    disability_status: text('disability_status'),
    education_level: text('education_level'),
    ethnic_group: text('ethnic_group'),
    time_detail: text('time_detail'),
    current_age: text('current_age'),
    service_type: text('service_type'),
    hcf_type: text('hcf_type'),
    obs_footnote: text('obs_footnote'),
    series_footnote: text('series_footnote'),
    source_link: text('source_link'),
    dataflow: context.dataflow,
  };
}

function cellText(record: FullRecord, column: CanonicalColumn): string | null {
  const value = record[column];
  return value === null ? null : String(value);
}

/**
 * Strict caller filters. A filter on a column the response does not carry
 * is a no-op.
 */
function applyExplicitFilters(
  records: FullRecord[],
  filters: Readonly<Record<string, readonly string[]>>
): FullRecord[] {
  let current = records;
  for (const [dimension, allowed] of Object.entries(filters)) {
    const column = canonicalColumnFor(dimension);
    if (column === undefined || column === 'iso3' || allowed.length === 0) {
      continue;
    }
    if (!current.some((record) => record[column] !== null)) {
      continue;
    }
    const accepted = new Set(allowed);
    current = current.filter((record) => {
      const value = cellText(record, column);
      return value !== null && accepted.has(value);
    });
  }
  return current;
}

function compareNullable<T extends string | number>(a: T | null, b: T | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

/**
 * Order by iso3 then period. Array#sort is stable, so source order breaks
 * remaining ties.
 */
export function compareRecords(a: FullRecord, b: FullRecord): number {
  return compareNullable(a.iso3, b.iso3) || compareNullable(a.period, b.period);
}

export function normalizeDetailed<L extends SchemaLevel>(
  rows: readonly RawRecord[],
  context: NormalizeContext<L>
): NormalizeResult<L> {
  let records = rows.map((row) => buildRecord(collectCells(row), context));
  const received = records.length;

  const { countries } = context;
  if (countries !== undefined && countries !== 'all' && countries.length > 0) {
    const wanted = new Set(countries.map((code) => code.toUpperCase()));
    records = records.filter((record) => record.iso3 !== null && wanted.has(record.iso3));
  }

  const filters = context.filters ?? {};
  records = applyExplicitFilters(records, filters);

  let defaultsApplied: ReadonlyMap<DisaggregationColumn, string> = new Map();
  if (context.applyTotals !== false) {
    const explicit = new Set<DisaggregationColumn>();
    for (const dimension of Object.keys(filters)) {
      const column = DISAGGREGATION_COLUMNS[dimension.toUpperCase()];
      if (column) {
        explicit.add(column);
      }
    }
    const result = applyTotalDefaults(records, {
      dataflow: context.dataflow,
      withTotals: context.indicator?.disaggregationsWithTotals ?? [],
      explicit,
    });
    records = result.records;
    defaultsApplied = result.applied;
  }

  records.sort(compareRecords);

  return {
    records: records.map((record) => projectRecord(record, context.level)),
    defaultsApplied,
    droppedRows: received - records.length,
  };
}

/**
 * Canonical records for one successful response
 */
export function normalize<L extends SchemaLevel>(
  rows: readonly RawRecord[],
  context: NormalizeContext<L>
): CanonicalRecord<L>[] {
  return normalizeDetailed(rows, context).records;
}
