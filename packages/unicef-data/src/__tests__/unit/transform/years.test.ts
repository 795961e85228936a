/**
 * Year Argument Tests
 */

import { describe, it, expect } from 'vitest';
import { circaTargets, parseYear } from '../../../transform/years.js';
import { InvalidQueryError } from '../../../core/errors.js';

describe('parseYear', () => {
  it('reads a single year', () => {
    expect(parseYear(2020)).toEqual({ start: 2020, end: 2020 });
    expect(parseYear(' 2019 ')).toEqual({ start: 2019, end: 2019 });
  });

  it('reads ranges with optional open ends', () => {
    expect(parseYear('2015:2023')).toEqual({ start: 2015, end: 2023 });
    expect(parseYear('2015:')).toEqual({ start: 2015, end: undefined });
    expect(parseYear(':2010')).toEqual({ start: undefined, end: 2010 });
    expect(parseYear({ start: 2000 })).toEqual({ start: 2000, end: undefined });
  });

  it('reads lists as sorted, de-duplicated targets', () => {
    expect(parseYear('2018,2015,2018')).toEqual({ start: 2015, end: 2018, list: [2015, 2018] });
    expect(parseYear([2020, '2010'])).toEqual({ start: 2010, end: 2020, list: [2010, 2020] });
    expect(parseYear({ list: [2019] })).toEqual({ start: 2019, end: 2019, list: [2019] });
  });

  it('means every year for null and undefined', () => {
    expect(parseYear(null)).toBeUndefined();
    expect(parseYear(undefined)).toBeUndefined();
  });

  it('rejects malformed input', () => {
    expect(() => parseYear('last year')).toThrow(InvalidQueryError);
    expect(() => parseYear('2015:2018:2020')).toThrow('Invalid year range: "2015:2018:2020"');
    expect(() => parseYear([])).toThrow('Year list is empty');
    expect(() => parseYear(20)).toThrow('Invalid year format: 20');
  });
});

describe('circaTargets', () => {
  it('targets the list, else the distinct range ends', () => {
    expect(circaTargets({ start: 2015, end: 2018, list: [2015, 2018] })).toEqual([2015, 2018]);
    expect(circaTargets({ start: 2015, end: 2015 })).toEqual([2015]);
    expect(circaTargets({ start: 2010, end: 2020 })).toEqual([2010, 2020]);
    expect(circaTargets({})).toEqual([]);
  });
});
