import type { RawCellValue } from '../../types';

/**
 * Marker for a blank cell, distinct from 0, '' and false
 */
export const EMPTY: unique symbol = Symbol('empty');

export type NormalizedValue = typeof EMPTY | string | number | boolean;

/**
 * Strips currency and thousands separators from text values. Numbers and booleans pass through.
 */
export function normalizeValue(value: RawCellValue | NormalizedValue): NormalizedValue {
  if (value === null || value === undefined || value === EMPTY) {
    return EMPTY;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[$,]/g, '').trim();
    return cleaned === '' ? EMPTY : cleaned;
  }
  return value;
}

export function isEmpty(value: NormalizedValue): value is typeof EMPTY {
  return value === EMPTY;
}

export function displayValue(value: NormalizedValue): string {
  return value === EMPTY ? '' : String(value);
}
