/**
 * CSV response parsing (papaparse)
 */

import Papa from 'papaparse';

import type { RawRecord } from '../core/types.js';

export interface ParsedCsv {
  readonly fields: readonly string[];
  readonly rows: readonly RawRecord[];
}

/**
 * Parse an SDMX-CSV body into header-keyed rows. Blank lines are skipped.
 */
export function parseCsv(text: string): ParsedCsv {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (body.trim() === '') {
    return { fields: [], rows: [] };
  }

  const result = Papa.parse<Record<string, unknown>>(body, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  return {
    fields: result.meta.fields ?? [],
    rows: result.data.map(toRawRecord),
  };
}

// Ragged rows carry an `__parsed_extra` array; only string cells are kept
function toRawRecord(row: Record<string, unknown>): RawRecord {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string') {
      record[key] = value;
    }
  }
  return record;
}
