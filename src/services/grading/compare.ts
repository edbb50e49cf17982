import type { Tolerance } from '../../types';
import { type NormalizedValue, displayValue, EMPTY } from './normalize';

export const DEFAULT_TOLERANCE: Tolerance = {
  absolute: 0.01,
  // Keeps 1.00 vs 1.01 inside the bound despite binary rounding
  relative: 1e-5
};

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
const SPECIAL_RE = /^[+-]?(inf|infinity|nan)$/i;

/**
 * Reads a normalized value as a float, or null when it is not numeric.
 * Booleans read as 1 and 0. Text must be a plain decimal literal; '', '12%' and '0x10' are not
 * numbers.
 */
export function toNumber(value: NormalizedValue): number | null {
  if (value === EMPTY) {
    return null;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  const text = value.trim();
  if (DECIMAL_RE.test(text)) {
    return Number(text);
  }
  if (SPECIAL_RE.test(text)) {
    const lower = text.toLowerCase();
    if (lower.endsWith('nan')) return NaN;
    return lower.startsWith('-') ? -Infinity : Infinity;
  }
  return null;
}

/**
 * Numeric comparison within tolerance when both sides are numbers, trimmed string equality otherwise
 */
export function valuesMatch(
  student: NormalizedValue,
  solution: NormalizedValue,
  tolerance: Tolerance = DEFAULT_TOLERANCE
): boolean {
  const a = toNumber(student);
  const b = toNumber(solution);

  if (a !== null && b !== null) {
    if (a === b) return true;
    if (!Number.isFinite(a) || !Number.isFinite(b)) return false;
    return Math.abs(a - b) <= tolerance.absolute + tolerance.relative * Math.abs(b);
  }

  return displayValue(student).trim() === displayValue(solution).trim();
}

export function resolveTolerance(overrides?: Partial<Tolerance>): Tolerance {
  return {
    absolute: overrides?.absolute ?? DEFAULT_TOLERANCE.absolute,
    relative: overrides?.relative ?? DEFAULT_TOLERANCE.relative
  };
}
