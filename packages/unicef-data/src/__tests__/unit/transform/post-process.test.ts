/**
 * Post-processing Tests
 *
 * Year filtering, closest-period matching, duplicate detection and the
 * most-recent / latest selections, grouped per country and indicator.
 */

import { describe, it, expect } from 'vitest';
import {
  applyCirca,
  dropMissing,
  filterYears,
  findDuplicates,
  latestOnly,
  mostRecent,
} from '../../../transform/post-process.js';
import type { MinimalRecord } from '../../../normalize/schema.js';

function obs(iso3: string, period: number | null, value: number | null, indicator = 'CME_MRY0T4'): MinimalRecord {
  return { iso3, country: null, indicator, period, value };
}

const a1 = obs('ALB', 2015, 10);
const a2 = obs('ALB', 2017, null);
const a3 = obs('ALB', 2018, 12);
const b1 = obs('BRA', 2016, 20);
const b2 = obs('BRA', 2020, 22);
const RECORDS = [b2, a1, a2, b1, a3];

describe('filterYears', () => {
  it('keeps listed periods only', () => {
    expect(filterYears(RECORDS, [2015, 2020])).toEqual([b2, a1]);
  });
});

describe('applyCirca', () => {
  it('picks the closest period per country for each target', () => {
    expect(applyCirca(RECORDS, [2017])).toEqual([a3, b1]);
  });

  it('keeps an observation closest to several targets once', () => {
    expect(applyCirca(RECORDS, [2015, 2016])).toEqual([a1, b1]);
  });

  it('breaks distance ties toward the earlier row', () => {
    const before = obs('ALB', 2014, 1);
    const after = obs('ALB', 2016, 2);
    expect(applyCirca([before, after], [2015])).toEqual([before]);
  });

  it('ignores observations without a value', () => {
    expect(applyCirca([a2, a1], [2017])).toEqual([a1]);
  });
});

describe('findDuplicates', () => {
  it('counts exact duplicates and keeps the first', () => {
    const copy = { ...a1 };
    const result = findDuplicates([a1, copy, a3]);
    expect(result.duplicates).toBe(1);
    expect(result.unique).toEqual([a1, a3]);
    expect(result.unique[0]).toBe(a1);
  });

  it('treats any differing column as distinct', () => {
    expect(findDuplicates([a1, obs('ALB', 2015, 10.5)]).duplicates).toBe(0);
  });
});

describe('dropMissing', () => {
  it('removes rows without a value', () => {
    expect(dropMissing(RECORDS)).toEqual([b2, a1, b1, a3]);
  });
});

describe('mostRecent', () => {
  it('returns the newest n per country, newest first', () => {
    expect(mostRecent(RECORDS, 1)).toEqual([a3, b2]);
    expect(mostRecent(RECORDS, 2)).toEqual([a3, a2, b2, b1]);
  });

  it('returns everything for a non-positive count', () => {
    expect(mostRecent(RECORDS, 0)).toEqual(RECORDS);
  });

  it('groups by indicator as well as country', () => {
    const other = obs('ALB', 2010, 90, 'IM_DTP3');
    expect(mostRecent([...RECORDS, other], 1)).toEqual([a3, other, b2]);
  });
});

describe('latestOnly', () => {
  it('keeps the latest period with a value', () => {
    expect(latestOnly(RECORDS)).toEqual([a3, b2]);
  });

  it('keeps the earlier row when periods tie', () => {
    const first = obs('ALB', 2018, 12);
    const second = obs('ALB', 2018, 13);
    expect(latestOnly([first, second])).toEqual([first]);
    expect(latestOnly([first, second])[0]).toBe(first);
  });
});
