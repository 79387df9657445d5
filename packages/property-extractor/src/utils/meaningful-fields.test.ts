import { describe, expect, test } from 'vitest';

import { countMeaningfulFields } from './meaningful-fields';

describe('countMeaningfulFields', () => {
  test('counts populated values of any type', () => {
    expect(
      countMeaningfulFields({
        price: 5800,
        corner_room: false,
        balcony_area: 0,
        city: '渋谷区',
        stations: [{ name: '渋谷' }],
      }),
    ).toBe(5);
  });

  test('skips empty values', () => {
    expect(
      countMeaningfulFields({
        price: null,
        address: '',
        parking: '   ',
        stations: [],
        extra: {},
        pet_policy: undefined,
      }),
    ).toBe(0);
  });

  test('skips underscore keys', () => {
    expect(
      countMeaningfulFields({
        _extracted_by_model: 'model-a',
        _note: 'x',
        city: '港区',
      }),
    ).toBe(1);
  });
});
