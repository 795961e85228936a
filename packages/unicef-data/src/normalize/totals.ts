/**
 * Default total filtering
 *
 * When the caller has not filtered a disaggregation dimension, keep only its
 * total so each country-period yields one headline value instead of every
 * breakdown. Caller filters always win and are applied strictly.
 *
 * @module normalize/totals
 */

import { TOTAL_CODE } from '../core/types.js';
import type { DisaggregationColumn } from './columns.js';
import type { FullRecord } from './schema.js';

/** Age codes accepted as the "all ages" value, in order of preference */
export const AGE_TOTAL_CANDIDATES: readonly string[] = [TOTAL_CODE, 'Y0T4', 'Y0T14', 'Y0T17', 'Y15T49', 'ALLAGE'];

/** Disability code used as the headline value when no total exists */
export const DISABILITY_DEFAULT = 'PD';

const METADATA_DRIVEN: readonly DisaggregationColumn[] = [
  'wealth_quintile',
  'residence',
  'maternal_edu_lvl',
  'education_level',
  'ethnic_group',
];

export interface TotalsContext {
  readonly dataflow: string;
  /** Upper-case dimension ids that carry a `_T` total, from indicator metadata */
  readonly withTotals: readonly string[];
  /** Columns the caller filtered explicitly; never defaulted */
  readonly explicit: ReadonlySet<DisaggregationColumn>;
}

export interface TotalsResult {
  readonly records: FullRecord[];
  /** Column -> code that was kept */
  readonly applied: ReadonlyMap<DisaggregationColumn, string>;
}

function distinctValues(records: readonly FullRecord[], column: DisaggregationColumn): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    const value = record[column];
    if (value !== null) {
      seen.add(value);
    }
  }
  return [...seen];
}

/**
 * Code to keep for a column, or undefined to leave the column untouched
 */
export function chooseDefault(
  column: DisaggregationColumn,
  values: readonly string[],
  context: Pick<TotalsContext, 'dataflow' | 'withTotals'>
): string | undefined {
  if (values.length === 0) {
    return undefined;
  }
  const present = new Set(values);
  const dimension = column.toUpperCase();
  const hasTotals = context.withTotals.includes(dimension);

  switch (column) {
    case 'sex':
      return present.has(TOTAL_CODE) ? TOTAL_CODE : undefined;

    case 'age':
      if (present.has(TOTAL_CODE)) {
        return TOTAL_CODE;
      }
      if (context.dataflow === 'NUTRITION' && present.has('Y0T4')) {
        return 'Y0T4';
      }
      return AGE_TOTAL_CANDIDATES.find((code) => present.has(code));

    case 'disability_status':
      if (hasTotals) {
        return present.has(TOTAL_CODE) ? TOTAL_CODE : undefined;
      }
      return present.has(DISABILITY_DEFAULT) && present.size > 1 ? DISABILITY_DEFAULT : undefined;

    default:
      if (!METADATA_DRIVEN.includes(column)) {
        return undefined;
      }
      // No metadata at all: fall back to filtering any column that has a total
      if ((hasTotals || context.withTotals.length === 0) && present.has(TOTAL_CODE)) {
        return TOTAL_CODE;
      }
      return undefined;
  }
}

const DEFAULT_ORDER: readonly DisaggregationColumn[] = [
  'sex',
  'age',
  'wealth_quintile',
  'residence',
  'maternal_edu_lvl',
  'disability_status',
  'education_level',
  'ethnic_group',
];

/**
 * Apply defaults column by column. Rows with no value in a defaulted
 * column are dropped along with the breakdown rows.
 */
export function applyTotalDefaults(records: readonly FullRecord[], context: TotalsContext): TotalsResult {
  let current: FullRecord[] = [...records];
  const applied = new Map<DisaggregationColumn, string>();

  for (const column of DEFAULT_ORDER) {
    if (context.explicit.has(column)) {
      continue;
    }
    const keep = chooseDefault(column, distinctValues(current, column), context);
    if (keep === undefined) {
      continue;
    }
    current = current.filter((record) => record[column] === keep);
    applied.set(column, keep);
  }

  return { records: current, applied };
}
