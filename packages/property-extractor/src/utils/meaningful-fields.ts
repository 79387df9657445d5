import { isPlainObject } from '@propscan/shared';

/**
 * Count fields that carry information.
 *
 * Keys starting with `_` are bookkeeping and never count. Values count unless
 * they are `null`, `undefined`, an empty or blank string, an empty array or
 * an empty object.
 */
export function countMeaningfulFields(fields: Record<string, unknown>): number {
  return Object.entries(fields).filter(
    ([key, value]) => !key.startsWith('_') && isMeaningful(value),
  ).length;
}

function isMeaningful(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'string') {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isPlainObject(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}
