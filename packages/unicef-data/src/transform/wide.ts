/**
 * Wide reshapes
 *
 * Each pivot returns a rectangular table: every row carries every column,
 * with null where no observation exists. Rows are ordered by their index
 * columns; pivoted columns are sorted. When several observations land in
 * one cell the first non-null value wins.
 *
 * @module transform/wide
 */

import { InvalidQueryError } from '../core/errors.js';
import type { MinimalRecord, StandardRecord } from '../normalize/schema.js';

export type WideCell = string | number | null;

export interface WideTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, WideCell>>[];
}

export type PivotDimension = 'sex' | 'age' | 'wealth_quintile' | 'residence' | 'maternal_edu_lvl';

export const PIVOT_DIMENSIONS: readonly PivotDimension[] = [
  'sex',
  'age',
  'wealth_quintile',
  'residence',
  'maternal_edu_lvl',
];

export function isPivotDimension(value: string): value is PivotDimension {
  return PIVOT_DIMENSIONS.some((dimension) => dimension === value);
}

interface IndexedRow {
  readonly index: readonly WideCell[];
  readonly cells: Map<string, WideCell>;
}

function compareCells(a: WideCell, b: WideCell): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : 1;
}

function compareIndex(a: readonly WideCell[], b: readonly WideCell[]): number {
  for (let i = 0; i < a.length; i++) {
    const order = compareCells(a[i] ?? null, b[i] ?? null);
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Generic pivot: rows keyed by `indexOf`, one column per `columnOf` value
 */
function pivot<R extends MinimalRecord>(
  records: readonly R[],
  indexColumns: readonly string[],
  indexOf: (record: R) => readonly WideCell[],
  columnOf: (record: R) => string | null,
  sortColumns: (names: string[]) => string[]
): WideTable {
  const rows = new Map<string, IndexedRow>();
  const pivoted = new Set<string>();

  for (const record of records) {
    const column = columnOf(record);
    if (column === null) continue;
    pivoted.add(column);

    const index = indexOf(record);
    const id = JSON.stringify(index);
    let row = rows.get(id);
    if (!row) {
      row = { index, cells: new Map() };
      rows.set(id, row);
    }
    const existing = row.cells.get(column);
    if (existing === undefined || existing === null) {
      row.cells.set(column, record.value);
    }
  }

  const valueColumns = sortColumns([...pivoted]);
  const ordered = [...rows.values()].sort((a, b) => compareIndex(a.index, b.index));

  return {
    columns: [...indexColumns, ...valueColumns],
    rows: ordered.map((row) => {
      const out: Record<string, WideCell> = {};
      indexColumns.forEach((name, i) => {
        out[name] = row.index[i] ?? null;
      });
      for (const name of valueColumns) {
        out[name] = row.cells.get(name) ?? null;
      }
      return out;
    }),
  };
}

const byText = (names: string[]): string[] => names.sort();
const byNumber = (names: string[]): string[] => names.sort((a, b) => Number(a) - Number(b));

/**
 * Countries as rows, periods as columns. Adds an indicator index column
 * when more than one indicator is present.
 */
export function toWide(records: readonly MinimalRecord[]): WideTable {
  const multiIndicator = new Set(records.map((record) => record.indicator)).size > 1;
  const indexColumns = multiIndicator ? ['iso3', 'country', 'indicator'] : ['iso3', 'country'];

  return pivot(
    records,
    indexColumns,
    (record) =>
      multiIndicator ? [record.iso3, record.country, record.indicator] : [record.iso3, record.country],
    (record) => (record.period === null ? null : String(record.period)),
    byNumber
  );
}

/**
 * Country-periods as rows, indicators as columns
 */
export function toWideIndicators(records: readonly MinimalRecord[]): WideTable {
  return pivot(
    records,
    ['iso3', 'country', 'period'],
    (record) => [record.iso3, record.country, record.period],
    (record) => record.indicator,
    byText
  );
}

/**
 * Disaggregation codes as columns, named `value_<code>` (compound pivots
 * join codes with `_`). Other disaggregation dimensions carrying values
 * stay in the row index.
 *
 * @throws {InvalidQueryError} no pivot dimension given
 */
export function toWideAttributes(
  records: readonly StandardRecord[],
  pivotOn: readonly PivotDimension[]
): WideTable {
  if (pivotOn.length === 0) {
    throw new InvalidQueryError("Format 'wide_attributes' requires a pivot dimension", [
      `Valid options: ${PIVOT_DIMENSIONS.join(', ')}`,
    ]);
  }

  const carried = PIVOT_DIMENSIONS.filter(
    (dimension) => !pivotOn.includes(dimension) && records.some((record) => record[dimension] !== null)
  );
  const indexColumns = ['iso3', 'country', 'period', 'indicator', ...carried];

  return pivot(
    records,
    indexColumns,
    (record) => [
      record.iso3,
      record.country,
      record.period,
      record.indicator,
      ...carried.map((dimension) => record[dimension]),
    ],
    (record) => {
      const codes = pivotOn.map((dimension) => record[dimension]);
      return codes.some((code) => code === null) ? null : `value_${codes.join('_')}`;
    },
    byText
  );
}
