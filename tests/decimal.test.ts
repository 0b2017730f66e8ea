import { describe, expect, it } from 'vitest';
import { digitCount, parseDecimalText, toDecimal } from '../src/parsers/decimal';

describe('toDecimal', () => {
  it('rescales with half-up rounding', () => {
    expect(toDecimal('1.005', 4, 2)).toBe('1.01');
    expect(toDecimal('1.004', 4, 2)).toBe('1.00');
    expect(toDecimal('7', 5, 2)).toBe('7.00');
    expect(toDecimal('-12.5', 4, 2)).toBe('-12.50');
  });

  it('returns null when the value exceeds the precision', () => {
    expect(toDecimal('12345.6', 5, 2)).toBeNull();
  });

  it('drops the sign of a value rounded to zero', () => {
    expect(toDecimal('-0.001', 3, 2)).toBe('0.00');
  });

  it('reads exponent notation', () => {
    expect(toDecimal('1.5e2', 5, 0)).toBe('150');
  });

  it('bounds the work done for extreme exponents', () => {
    expect(toDecimal('1e-99999999', 10, 2)).toBe('0.00');
    expect(toDecimal('-7e-99999999', 10, 2)).toBe('0.00');
    expect(toDecimal('1e99999999', 10, 2)).toBeNull();
    expect(toDecimal('0e99999999', 5, 2)).toBe('0.00');
    expect(toDecimal('5e-3', 3, 2)).toBe('0.01');
    expect(toDecimal('4e-3', 3, 2)).toBe('0.00');
  });

  it('rejects non-numeric text', () => {
    expect(toDecimal('abc', 10, 0)).toBeNull();
    expect(toDecimal('.', 10, 0)).toBeNull();
  });
});

describe('parseDecimalText', () => {
  it('splits sign, digits and scale', () => {
    expect(parseDecimalText('-001.250')).toEqual({ negative: true, unscaled: 1250n, scale: 3 });
    expect(digitCount(0n)).toBe(1);
    expect(digitCount(1250n)).toBe(4);
  });
});
