import { describe, expect, test } from 'vitest';

import { toWesternYear } from './era-converter';

describe('toWesternYear', () => {
  test.each([
    ['平成27年', 2015],
    ['令和元年', 2019],
    ['令和5年', 2023],
    ['昭和60年築', 1985],
    ['大正元年', 1912],
    ['明治45年', 1912],
    ['平成１０年', 1998],
    ['1998年', 1998],
    ['2015年3月', 2015],
    ['２００１年', 2001],
    ['2010', 2010],
  ])('%s → %d', (input, expected) => {
    expect(toWesternYear(input)).toBe(expected);
  });

  test('passes numbers through', () => {
    expect(toWesternYear(2018)).toBe(2018);
  });

  test('leaves unrecognized text untouched', () => {
    expect(toWesternYear('築浅')).toBe('築浅');
    expect(toWesternYear('')).toBe('');
  });
});
