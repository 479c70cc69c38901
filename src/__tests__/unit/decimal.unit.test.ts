/**
 * Unit Tests — Exact Decimal Arithmetic
 */
import { divide, fromInteger, multiply, parseDecimal, toFixedDecimal } from '@shared/decimal';

describe('parseDecimal()', () => {
  it('should keep the digits as a fraction over a power of ten', () => {
    expect(parseDecimal('25.10')).toEqual({ num: 2510n, den: 100n });
    expect(parseDecimal('-0.5')).toEqual({ num: -5n, den: 10n });
    expect(parseDecimal('7')).toEqual({ num: 7n, den: 1n });
  });

  it.each([['1e3'], ['12.'], ['abc'], ['']])('should reject %p', (text) => {
    expect(() => parseDecimal(text)).toThrow(RangeError);
  });
});

describe('divide()', () => {
  it('should keep the denominator positive', () => {
    expect(divide(fromInteger(1), fromInteger(-2))).toEqual({ num: -1n, den: 2n });
  });

  it('should refuse to divide by zero', () => {
    expect(() => divide(fromInteger(1), parseDecimal('0.00'))).toThrow('Division by zero');
  });
});

describe('toFixedDecimal()', () => {
  it('should round a repeating quotient to cents', () => {
    expect(toFixedDecimal(divide(parseDecimal('10000'), parseDecimal('25.10')))).toBe('398.41');
    expect(toFixedDecimal(divide(fromInteger(350), fromInteger(12)))).toBe('29.17');
  });

  it.each([
    ['0.125', '0.12'],
    ['0.135', '0.14'],
    ['-0.125', '-0.12'],
    ['0.005', '0.00'],
    ['-0.004', '0.00'],
    ['1234.5', '1234.50'],
  ])('should round %s half to even as %s', (input, expected) => {
    expect(toFixedDecimal(parseDecimal(input))).toBe(expected);
  });

  it('should print whole numbers when asked for no places', () => {
    expect(toFixedDecimal(parseDecimal('2.5'), 0)).toBe('2');
    expect(toFixedDecimal(parseDecimal('3.5'), 0)).toBe('4');
  });

  it('should multiply without losing digits', () => {
    expect(toFixedDecimal(multiply(parseDecimal('0.1'), parseDecimal('0.2')), 3)).toBe('0.020');
  });
});
