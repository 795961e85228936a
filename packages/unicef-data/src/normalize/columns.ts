/**
 * Source column -> canonical column lookup
 *
 * Covers both id headers (`labels=id`) and the label headers the API emits
 * with `labels=both`. Headers not listed here map to their lower-cased form
 * when that is a canonical column; anything else is dropped.
 */

import { SCHEMA_COLUMNS, type CanonicalColumn } from './schema.js';

export const COLUMN_MAP: Readonly<Record<string, CanonicalColumn>> = {
  REF_AREA: 'iso3',
  COUNTRY: 'iso3',
  'Geographic area': 'country',
  GEO_TYPE: 'geo_type',
  INDICATOR: 'indicator',
  Indicator: 'indicator_name',
  TIME_PERIOD: 'period',
  OBS_VALUE: 'value',
  UNIT_MEASURE: 'unit',
  'Unit of measure': 'unit_name',
  SEX: 'sex',
  Sex: 'sex_name',
  AGE: 'age',
  CURRENT_AGE: 'current_age',
  WEALTH_QUINTILE: 'wealth_quintile',
  'Wealth Quintile': 'wealth_quintile_name',
  RESIDENCE: 'residence',
  MATERNAL_EDU_LVL: 'maternal_edu_lvl',
  LOWER_BOUND: 'lower_bound',
  UPPER_BOUND: 'upper_bound',
  OBS_STATUS: 'obs_status',
  'Observation Status': 'obs_status_name',
  DATA_SOURCE: 'data_source',
  REF_PERIOD: 'ref_period',
  COUNTRY_NOTES: 'country_notes',
  DISABILITY_STATUS: 'disability_status',
  EDUCATION_LEVEL: 'education_level',
  ETHNIC_GROUP: 'ethnic_group',
  TIME_DETAIL: 'time_detail',
  SERVICE_TYPE: 'service_type',
  HCF_TYPE: 'hcf_type',
  OBS_FOOTNOTE: 'obs_footnote',
  SERIES_FOOTNOTE: 'series_footnote',
  SOURCE_LINK: 'source_link',
};

const CANONICAL = new Set<string>(SCHEMA_COLUMNS.full);

export function isCanonicalColumn(name: string): name is CanonicalColumn {
  return CANONICAL.has(name);
}

/**
 * Canonical column for a source header, or undefined when it has none
 */
export function canonicalColumnFor(header: string): CanonicalColumn | undefined {
  const mapped = COLUMN_MAP[header];
  if (mapped) {
    return mapped;
  }
  const lower = header.toLowerCase();
  return isCanonicalColumn(lower) ? lower : undefined;
}

/**
 * Disaggregation columns subject to default total filtering
 */
export type DisaggregationColumn =
  | 'sex'
  | 'age'
  | 'wealth_quintile'
  | 'residence'
  | 'maternal_edu_lvl'
  | 'disability_status'
  | 'education_level'
  | 'ethnic_group';

export const DISAGGREGATION_COLUMNS: Readonly<Record<string, DisaggregationColumn>> = {
  SEX: 'sex',
  AGE: 'age',
  WEALTH_QUINTILE: 'wealth_quintile',
  RESIDENCE: 'residence',
  MATERNAL_EDU_LVL: 'maternal_edu_lvl',
  DISABILITY_STATUS: 'disability_status',
  EDUCATION_LEVEL: 'education_level',
  ETHNIC_GROUP: 'ethnic_group',
};
