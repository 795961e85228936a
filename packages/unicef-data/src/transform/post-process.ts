/**
 * Post-processing over canonical records
 *
 * Every function returns a new array and leaves its input untouched.
 * Grouping is per country and indicator; groups come out in key order.
 *
 * @module transform/post-process
 */

import type { MinimalRecord } from '../normalize/schema.js';

type GroupKey = readonly [string | null, string | null];

function compareNullable<T extends string | number>(a: T | null, b: T | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function groupByCountryIndicator<R extends MinimalRecord>(records: readonly R[]): R[][] {
  const groups = new Map<string, { key: GroupKey; members: R[] }>();
  for (const record of records) {
    const id = JSON.stringify([record.iso3, record.indicator]);
    let group = groups.get(id);
    if (!group) {
      group = { key: [record.iso3, record.indicator], members: [] };
      groups.set(id, group);
    }
    group.members.push(record);
  }
  return [...groups.values()]
    .sort((a, b) => compareNullable(a.key[0], b.key[0]) || compareNullable(a.key[1], b.key[1]))
    .map((group) => group.members);
}

/**
 * Identity of a record: every column value, in column order
 */
export function recordKey(record: object): string {
  return JSON.stringify(Object.values(record));
}

export function filterYears<R extends MinimalRecord>(records: readonly R[], years: readonly number[]): R[] {
  const wanted = new Set(years);
  return records.filter((record) => record.period !== null && wanted.has(record.period));
}

/**
 * For each target year keep, per country and indicator, the observation
 * whose period is closest to it. Missing values are dropped first; an
 * observation closest to several targets is kept once.
 */
export function applyCirca<R extends MinimalRecord>(records: readonly R[], targets: readonly number[]): R[] {
  const groups = groupByCountryIndicator(records.filter((record) => record.value !== null));
  const picked: R[] = [];
  const seen = new Set<string>();

  for (const target of targets) {
    for (const members of groups) {
      let best: R | undefined;
      let bestDistance = Number.POSITIVE_INFINITY;
      for (const record of members) {
        if (record.period === null) continue;
        const distance = Math.abs(record.period - target);
        if (distance < bestDistance) {
          best = record;
          bestDistance = distance;
        }
      }
      if (!best) continue;

      const key = recordKey(best);
      if (!seen.has(key)) {
        seen.add(key);
        picked.push(best);
      }
    }
  }
  return picked;
}

export interface DuplicateScan<R> {
  readonly unique: R[];
  readonly duplicates: number;
}

/**
 * Exact duplicates (every column equal); the first occurrence is kept
 */
export function findDuplicates<R extends object>(records: readonly R[]): DuplicateScan<R> {
  const seen = new Set<string>();
  const unique: R[] = [];
  for (const record of records) {
    const key = recordKey(record);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(record);
    }
  }
  return { unique, duplicates: records.length - unique.length };
}

export function dropMissing<R extends MinimalRecord>(records: readonly R[]): R[] {
  return records.filter((record) => record.value !== null);
}

/**
 * The `count` most recent observations per country and indicator,
 * newest first
 */
export function mostRecent<R extends MinimalRecord>(records: readonly R[], count: number): R[] {
  if (count <= 0) {
    return [...records];
  }
  const result: R[] = [];
  for (const members of groupByCountryIndicator(records)) {
    const newestFirst = [...members].sort((a, b) => {
      if (a.period === b.period) return 0;
      if (a.period === null) return 1;
      if (b.period === null) return -1;
      return b.period - a.period;
    });
    result.push(...newestFirst.slice(0, count));
  }
  return result;
}

/**
 * One observation per country and indicator: the latest period with a
 * value. Ties keep the earlier row.
 */
export function latestOnly<R extends MinimalRecord>(records: readonly R[]): R[] {
  const result: R[] = [];
  for (const members of groupByCountryIndicator(dropMissing(records))) {
    let latest: R | undefined;
    for (const record of members) {
      if (record.period === null) continue;
      if (!latest || latest.period === null || record.period > latest.period) {
        latest = record;
      }
    }
    if (latest) {
      result.push(latest);
    }
  }
  return result;
}
