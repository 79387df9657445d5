import { ERA_START_YEARS, type EraName } from '../config/constants';

const ERA_YEAR_PATTERN = /(令和|平成|昭和|大正|明治)\s*(元|\d+)\s*年?/;
const WESTERN_YEAR_PATTERN = /(\d{4})\s*年?/;
const FULL_WIDTH_DIGIT = /[０-９]/g;

function isEraName(value: string): value is EraName {
  return Object.hasOwn(ERA_START_YEARS, value);
}

function toHalfWidthDigits(text: string): string {
  return text.replace(FULL_WIDTH_DIGIT, (digit) =>
    String.fromCharCode(digit.charCodeAt(0) - 0xfee0),
  );
}

/**
 * Convert a year written in a Japanese era or with a `年` suffix to a
 * Western calendar year.
 *
 * `平成27年` → 2015, `令和元年` → 2019, `1998年` → 1998. Full-width digits are
 * accepted. Numbers pass through; strings with no recognizable year are
 * returned unchanged.
 */
export function toWesternYear(value: number | string): number | string {
  if (typeof value === 'number') {
    return value;
  }

  const text = toHalfWidthDigits(value);

  const era = ERA_YEAR_PATTERN.exec(text);
  if (era) {
    const [, eraName, eraYearText] = era;
    if (isEraName(eraName)) {
      const eraYear = eraYearText === '元' ? 1 : parseInt(eraYearText, 10);
      return ERA_START_YEARS[eraName] + eraYear - 1;
    }
  }

  const western = WESTERN_YEAR_PATTERN.exec(text);
  if (western) {
    return parseInt(western[1], 10);
  }

  return value;
}
