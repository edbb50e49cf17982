import { describe, expect, it } from 'vitest';
import { EMPTY, displayValue, normalizeValue } from '../src/services/grading/normalize';

describe('normalizeValue', () => {
  it('maps absent and blank values to the empty marker', () => {
    expect(normalizeValue(null)).toBe(EMPTY);
    expect(normalizeValue(undefined)).toBe(EMPTY);
    expect(normalizeValue('')).toBe(EMPTY);
    expect(normalizeValue('   ')).toBe(EMPTY);
    expect(normalizeValue('$')).toBe(EMPTY);
  });

  it('keeps zero and false distinct from empty', () => {
    expect(normalizeValue(0)).toBe(0);
    expect(normalizeValue(false)).toBe(false);
    expect(normalizeValue('0')).toBe('0');
  });

  it('strips currency symbols and thousands separators', () => {
    expect(normalizeValue('$1,234.50')).toBe('1234.50');
    expect(normalizeValue(' -12.5% ')).toBe('-12.5%');
    expect(normalizeValue('1,000,000')).toBe('1000000');
  });

  it('passes numbers through unchanged', () => {
    expect(normalizeValue(42.125)).toBe(42.125);
    expect(normalizeValue(-3)).toBe(-3);
  });

  it('is idempotent', () => {
    const inputs = [null, '', '  $1,234.50 ', 'Yes', 'a, b', 7, true, '$ 5'];
    for (const input of inputs) {
      const once = normalizeValue(input);
      expect(normalizeValue(once)).toBe(once);
    }
  });

  it('displays the empty marker as an empty string', () => {
    expect(displayValue(EMPTY)).toBe('');
    expect(displayValue(1.5)).toBe('1.5');
  });
});
