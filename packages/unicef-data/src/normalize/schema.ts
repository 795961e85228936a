/**
 * Canonical output schema
 *
 * Four fixed record shapes, one per schema level. Every declared column is
 * present on every row; `null` is the only missing-value sentinel. Column
 * order is the key order of each projection below and matches
 * SCHEMA_COLUMNS.
 *
 * @module normalize/schema
 */

export type SchemaLevel = 'minimal' | 'standard' | 'extended' | 'full';

export const SCHEMA_LEVELS: readonly SchemaLevel[] = ['minimal', 'standard', 'extended', 'full'];

export interface MinimalRecord {
  readonly iso3: string | null;
  readonly country: string | null;
  readonly indicator: string | null;
  /** Decimal year */
  readonly period: number | null;
  readonly value: number | null;
}

export interface StandardRecord extends MinimalRecord {
  readonly geo_type: number | null;
  readonly indicator_name: string | null;
  readonly unit: string | null;
  readonly sex: string | null;
  readonly age: string | null;
  readonly wealth_quintile: string | null;
  readonly residence: string | null;
  readonly maternal_edu_lvl: string | null;
  readonly lower_bound: number | null;
  readonly upper_bound: number | null;
  readonly obs_status: string | null;
  readonly data_source: string | null;
}

export interface ExtendedRecord extends StandardRecord {
  readonly unit_name: string | null;
  readonly sex_name: string | null;
  readonly wealth_quintile_name: string | null;
  readonly obs_status_name: string | null;
  readonly ref_period: string | null;
  readonly country_notes: string | null;
}

export interface FullRecord extends ExtendedRecord {
  readonly disability_status: string | null;
  readonly education_level: string | null;
  readonly ethnic_group: string | null;
  readonly time_detail: string | null;
  readonly current_age: string | null;
  readonly service_type: string | null;
  readonly hcf_type: string | null;
  readonly obs_footnote: string | null;
  readonly series_footnote: string | null;
  readonly source_link: string | null;
  /** Dataflow that answered */
  readonly dataflow: string | null;
}

export interface CanonicalRecordMap {
  readonly minimal: MinimalRecord;
  readonly standard: StandardRecord;
  readonly extended: ExtendedRecord;
  readonly full: FullRecord;
}

export type CanonicalRecord<L extends SchemaLevel = 'extended'> = CanonicalRecordMap[L];

export type CanonicalColumn = keyof FullRecord;

export const NUMERIC_COLUMNS: ReadonlySet<CanonicalColumn> = new Set<CanonicalColumn>([
  'period',
  'value',
  'geo_type',
  'lower_bound',
  'upper_bound',
]);

export const SCHEMA_COLUMNS = {
  minimal: ['iso3', 'country', 'indicator', 'period', 'value'],
  standard: [
    'iso3', 'country', 'period', 'geo_type', 'indicator', 'indicator_name', 'value',
    'unit', 'sex', 'age', 'wealth_quintile', 'residence', 'maternal_edu_lvl',
    'lower_bound', 'upper_bound', 'obs_status', 'data_source',
  ],
  extended: [
    'iso3', 'country', 'period', 'geo_type', 'indicator', 'indicator_name', 'value',
    'unit', 'unit_name', 'sex', 'sex_name', 'age', 'wealth_quintile',
    'wealth_quintile_name', 'residence', 'maternal_edu_lvl', 'lower_bound',
    'upper_bound', 'obs_status', 'obs_status_name', 'data_source', 'ref_period',
    'country_notes',
  ],
  full: [
    'iso3', 'country', 'period', 'geo_type', 'indicator', 'indicator_name', 'value',
    'unit', 'unit_name', 'sex', 'sex_name', 'age', 'wealth_quintile',
    'wealth_quintile_name', 'residence', 'maternal_edu_lvl', 'lower_bound',
    'upper_bound', 'obs_status', 'obs_status_name', 'data_source', 'ref_period',
    'country_notes', 'disability_status', 'education_level', 'ethnic_group',
    'time_detail', 'current_age', 'service_type', 'hcf_type', 'obs_footnote',
    'series_footnote', 'source_link', 'dataflow',
  ],
} as const satisfies { readonly [L in SchemaLevel]: readonly (keyof CanonicalRecordMap[L])[] };

// ============================================================================
// Projections
// ============================================================================

function toMinimal(r: FullRecord): MinimalRecord {
  return {
    iso3: r.iso3,
    country: r.country,
    indicator: r.indicator,
    period: r.period,
    value: r.value,
  };
}

function toStandard(r: FullRecord): StandardRecord {
  return {
    iso3: r.iso3,
    country: r.country,
    period: r.period,
    geo_type: r.geo_type,
    indicator: r.indicator,
    indicator_name: r.indicator_name,
    value: r.value,
    unit: r.unit,
    sex: r.sex,
    age: r.age,
    wealth_quintile: r.wealth_quintile,
    residence: r.residence,
    maternal_edu_lvl: r.maternal_edu_lvl,
    lower_bound: r.lower_bound,
    upper_bound: r.upper_bound,
    obs_status: r.obs_status,
    data_source: r.data_source,
  };
}

function toExtended(r: FullRecord): ExtendedRecord {
  return {
    iso3: r.iso3,
    country: r.country,
    period: r.period,
    geo_type: r.geo_type,
    indicator: r.indicator,
    indicator_name: r.indicator_name,
    value: r.value,
    unit: r.unit,
    unit_name: r.unit_name,
    sex: r.sex,
    sex_name: r.sex_name,
    age: r.age,
    wealth_quintile: r.wealth_quintile,
    wealth_quintile_name: r.wealth_quintile_name,
    residence: r.residence,
    maternal_edu_lvl: r.maternal_edu_lvl,
    lower_bound: r.lower_bound,
    upper_bound: r.upper_bound,
    obs_status: r.obs_status,
    obs_status_name: r.obs_status_name,
    data_source: r.data_source,
    ref_period: r.ref_period,
    country_notes: r.country_notes,
  };
}

function toFull(r: FullRecord): FullRecord {
  return {
    ...toExtended(r),
    disability_status: r.disability_status,
    education_level: r.education_level,
    ethnic_group: r.ethnic_group,
    time_detail: r.time_detail,
    current_age: r.current_age,
    service_type: r.service_type,
    hcf_type: r.hcf_type,
    obs_footnote: r.obs_footnote,
    series_footnote: r.series_footnote,
    source_link: r.source_link,
    dataflow: r.dataflow,
  };
}

const PROJECTIONS: { readonly [L in SchemaLevel]: (record: FullRecord) => CanonicalRecordMap[L] } = {
  minimal: toMinimal,
  standard: toStandard,
  extended: toExtended,
  full: toFull,
};

/**
 * Project a fully-populated row down to a schema level
 */
export function projectRecord<L extends SchemaLevel>(record: FullRecord, level: L): CanonicalRecord<L> {
  const project = PROJECTIONS[level];
  return project(record);
}

export function columnsFor(level: SchemaLevel): readonly CanonicalColumn[] {
  return SCHEMA_COLUMNS[level];
}

export function isSchemaLevel(value: string): value is SchemaLevel {
  return value === 'minimal' || value === 'standard' || value === 'extended' || value === 'full';
}
