import { describe, expect, test } from '@jest/globals';

import { checkCount, ordinal } from '../../src/common/util';

describe('ordinal', () => {
  test('Uses st, nd and rd outside the teens', () => {
    expect([1, 2, 3, 4, 10].map(ordinal)).toEqual(['1st', '2nd', '3rd', '4th', '10th']);
    expect([21, 22, 23, 101, 102].map(ordinal)).toEqual(['21st', '22nd', '23rd', '101st', '102nd']);
  });

  test('Uses th for 11 to 13', () => {
    expect([11, 12, 13, 111, 112, 1013].map(ordinal)).toEqual(['11th', '12th', '13th', '111th', '112th', '1013th']);
  });

  test('Formats large ordinals', () => {
    expect(ordinal(1_000_000)).toBe('1000000th');
  });
});

describe('checkCount', () => {
  test('Returns valid counts', () => {
    expect(checkCount('n', 0)).toBe(0);
    expect(checkCount('n', 5, 1)).toBe(5);
  });

  test('Throws a RangeError naming the argument', () => {
    expect(() => checkCount('skip count', -1)).toThrow('skip count must be an integer >= 0, got -1');
    expect(() => checkCount('n', 0, 1)).toThrow(RangeError);
    expect(() => checkCount('n', NaN)).toThrow(RangeError);
    expect(() => checkCount('n', Number.MAX_SAFE_INTEGER + 1)).toThrow(RangeError);
  });
});
