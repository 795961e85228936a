/**
 * Year argument parsing
 *
 * Accepted forms:
 * - 2020               single year
 * - "2015:2023"        inclusive range
 * - "2015,2018,2020"   explicit list (non-contiguous)
 * - [2015, 2018]       explicit list
 * - { start, end }     range, either end open
 */

import { InvalidQueryError } from '../core/errors.js';
import type { YearRange } from '../core/types.js';

export type YearInput = number | string | readonly (number | string)[] | YearRange;

function toYear(raw: number | string, original: unknown): number {
  const text = typeof raw === 'number' ? String(raw) : raw.trim();
  if (!/^\d{4}$/.test(text)) {
    throw new InvalidQueryError(`Invalid year format: ${JSON.stringify(original)}`, [
      "Expected a year, 'YYYY:YYYY', 'YYYY,YYYY,YYYY', a list of years or { start, end }",
    ]);
  }
  return Number(text);
}

function fromList(values: readonly (number | string)[], original: unknown): YearRange {
  if (values.length === 0) {
    throw new InvalidQueryError('Year list is empty');
  }
  const list = [...new Set(values.map((value) => toYear(value, original)))].sort((a, b) => a - b);
  return { start: list[0], end: list[list.length - 1], list };
}

/**
 * Normalize a year argument; undefined or null means every year
 *
 * @throws {InvalidQueryError} unparseable input
 */
export function parseYear(input: YearInput | null | undefined): YearRange | undefined {
  if (input === null || input === undefined) {
    return undefined;
  }

  if (typeof input === 'number') {
    const year = toYear(input, input);
    return { start: year, end: year };
  }

  if (typeof input === 'string') {
    const text = input.trim();
    if (text.includes(':')) {
      const parts = text.split(':');
      if (parts.length !== 2) {
        throw new InvalidQueryError(`Invalid year range: ${JSON.stringify(input)}`);
      }
      const [start = '', end = ''] = parts;
      return {
        start: start.trim() ? toYear(start, input) : undefined,
        end: end.trim() ? toYear(end, input) : undefined,
      };
    }
    if (text.includes(',')) {
      return fromList(text.split(','), input);
    }
    const year = toYear(text, input);
    return { start: year, end: year };
  }

  if (isYearList(input)) {
    return fromList(input, input);
  }

  if (input.list) {
    return fromList(input.list, input);
  }
  return { start: input.start, end: input.end };
}

function isYearList(input: readonly (number | string)[] | YearRange): input is readonly (number | string)[] {
  return Array.isArray(input);
}

/**
 * Target years for closest-period matching: the explicit list, else the
 * range ends (one target when they coincide)
 */
export function circaTargets(range: YearRange): number[] {
  if (range.list && range.list.length > 0) {
    return [...range.list];
  }
  const targets: number[] = [];
  if (range.start !== undefined) targets.push(range.start);
  if (range.end !== undefined && range.end !== range.start) targets.push(range.end);
  return targets;
}
