/**
 * Output Formatting for CLI Commands
 *
 * Consistent output across commands. Supports: table, json, ndjson, csv.
 * CSV goes through papaparse so quoting matches what the parser reads back.
 *
 * @module cli/lib/output
 */

import Papa from 'papaparse';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

export function isCliOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

export type OutputRow = Readonly<Record<string, unknown>>;

function formatCell(row: OutputRow, column: TableColumn): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Columns for every key of the first row, headed by the key itself
 */
export function columnsFromKeys(keys: readonly string[]): TableColumn[] {
  return keys.map((key) => ({ key, header: key }));
}

/**
 * Format data as a table
 */
export function formatTable(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  // Calculate column widths
  const widths = columns.map((col) => {
    if (col.width) return col.width;
    let width = col.header.length;
    for (const row of data) {
      width = Math.max(width, formatCell(row, col).length);
    }
    return width;
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const formatted = formatCell(row, col);
        return padCell(formatted, widths[i] ?? formatted.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
export function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as NDJSON
 */
export function formatNdjson(data: readonly unknown[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV. Null and undefined become empty fields.
 */
export function formatCsv(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  return Papa.unparse(
    {
      fields: columns.map((col) => col.header),
      data: data.map((row) => columns.map((col) => formatCell(row, col))),
    },
    { newline: '\n' }
  );
}

/**
 * Format data in the specified format
 */
export function formatOutput(
  data: readonly OutputRow[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
    default:
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /**
   * Numbers as-is, null as '-'
   */
  number: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    return String(value);
  },

  /**
   * Truncate a string to max length
   */
  truncate:
    (maxLength: number) =>
    (value: unknown): string => {
      const str = String(value ?? '');
      return str.length > maxLength ? str.slice(0, maxLength - 3) + '...' : str;
    },

  /**
   * Join a list with commas
   */
  list: (value: unknown): string => (Array.isArray(value) ? value.join(', ') : String(value ?? '')),

  /**
   * Format boolean as yes/no
   */
  yesNo: (value: unknown): string => {
    return value ? 'yes' : 'no';
  },
};

/**
 * Print output to console
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
