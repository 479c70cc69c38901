/**
 * Exact Decimal Arithmetic
 * Layer: Shared
 *
 * FundRecord keeps money and percentages as decimal strings. Anything that
 * computes with them goes through here: a value is a fraction of two
 * BigInts, so "25.10" stays 2510/100 and nothing is ever a float. Only the
 * final `toFixedDecimal()` rounds, half to even.
 *
 *   const shares = divide(parseDecimal('10000'), parseDecimal('25.10'));
 *   toFixedDecimal(shares); // "398.41"
 */
import { DECIMAL_PATTERN } from '@domain/entities/FundRecord';

/** `num / den`, `den` always positive. */
export interface Fraction {
  num: bigint;
  den: bigint;
}

export function parseDecimal(text: string): Fraction {
  if (!DECIMAL_PATTERN.test(text)) {
    throw new RangeError(`Not a decimal string: "${text}"`);
  }
  const negative = text.startsWith('-');
  const [whole, fraction = ''] = (negative ? text.slice(1) : text).split('.');
  const num = BigInt(`${whole}${fraction}`);
  return { num: negative ? -num : num, den: 10n ** BigInt(fraction.length) };
}

export function fromInteger(value: number): Fraction {
  return { num: BigInt(value), den: 1n };
}

export function multiply(a: Fraction, b: Fraction): Fraction {
  return { num: a.num * b.num, den: a.den * b.den };
}

export function divide(a: Fraction, b: Fraction): Fraction {
  if (b.num === 0n) throw new RangeError('Division by zero');
  const sign = b.num < 0n ? -1n : 1n;
  return { num: a.num * b.den * sign, den: a.den * b.num * sign };
}

export function isPositive(value: Fraction): boolean {
  return value.num > 0n;
}

/** Rounds to `places` decimals, ties to even, and always prints `places` digits. */
export function toFixedDecimal(value: Fraction, places = 2): string {
  const negative = value.num < 0n;
  const scaled = (negative ? -value.num : value.num) * 10n ** BigInt(places);

  let quotient = scaled / value.den;
  const twiceRemainder = (scaled % value.den) * 2n;
  if (twiceRemainder > value.den || (twiceRemainder === value.den && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  const digits = quotient.toString().padStart(places + 1, '0');
  const text = places === 0 ? digits : `${digits.slice(0, -places)}.${digits.slice(-places)}`;
  return negative && quotient !== 0n ? `-${text}` : text;
}
