/**
 * Unit Tests — Adapter Parsing Helpers
 *
 * Upstream values arrive as numbers, display strings or placeholders. These
 * tests pin down what each helper turns them into, and how collectRecords
 * counts the items it has to drop.
 */
import {
  absoluteUrl,
  collectRecords,
  dig,
  normalizeTicker,
  textOrNull,
  toDecimal,
  toFrequency,
  toIsoDate,
} from '@application/adapters/parsing';

import { sampleRecord } from '../helpers/fixtures';

describe('toDecimal()', () => {
  it.each([
    [31.45, '31.45'],
    [-0.5, '-0.5'],
    [0, '0'],
    ['$31.45', '31.45'],
    ['0.06%', '0.06'],
    ['1,234.50', '1234.50'],
    ['+2.5', '2.5'],
    ['.75', '0.75'],
    ['-.75', '-0.75'],
    ['12.', '12'],
  ])('should turn %p into %p', (input, expected) => {
    expect(toDecimal(input)).toBe(expected);
  });

  it.each([[null], [undefined], ['--'], ['N/A'], [''], ['abc'], [1e-7], [Number.NaN], [Infinity]])(
    'should return null for %p',
    (input) => {
      expect(toDecimal(input)).toBeNull();
    },
  );
});

describe('toIsoDate()', () => {
  it('should keep the date part of ISO strings', () => {
    expect(toIsoDate('2011-10-20')).toBe('2011-10-20');
    expect(toIsoDate('2011-10-20T00:00:00')).toBe('2011-10-20');
  });

  it('should parse abbreviated and full month names', () => {
    expect(toIsoDate('Oct 20, 2011')).toBe('2011-10-20');
    expect(toIsoDate('September 5, 2020')).toBe('2020-09-05');
  });

  it('should parse US slash dates', () => {
    expect(toIsoDate('3/7/2019')).toBe('2019-03-07');
  });

  it('should reject impossible calendar dates', () => {
    expect(toIsoDate('2023-02-30')).toBeNull();
    expect(toIsoDate('13/01/2020')).toBeNull();
  });

  it('should return null for non-dates', () => {
    expect(toIsoDate('soon')).toBeNull();
    expect(toIsoDate(20111020)).toBeNull();
    expect(toIsoDate('--')).toBeNull();
  });
});

describe('toFrequency()', () => {
  it.each([
    ['Monthly', 'Monthly'],
    ['QUARTERLY', 'Quarterly'],
    ['Semi-Annually', 'Semi-Annual'],
    ['Annually', 'Annual'],
    ['weekly', 'Weekly'],
    ['Variable', 'Variable'],
    ['None', 'None'],
    ['whenever', 'Unknown'],
  ])('should map %p to %p', (input, expected) => {
    expect(toFrequency(input)).toBe(expected);
  });

  it('should default to Unknown for missing values', () => {
    expect(toFrequency(undefined)).toBe('Unknown');
    expect(toFrequency('')).toBe('Unknown');
  });
});

describe('textOrNull() / normalizeTicker() / dig() / absoluteUrl()', () => {
  it('should trim text and drop placeholders', () => {
    expect(textOrNull('  Equity ')).toBe('Equity');
    expect(textOrNull('n/a')).toBeNull();
    expect(textOrNull(42)).toBeNull();
  });

  it('should upper-case tickers and reject malformed ones', () => {
    expect(normalizeTicker(' brk.b ')).toBe('BRK.B');
    expect(normalizeTicker('has space')).toBeNull();
    expect(normalizeTicker('-LEADING')).toBeNull();
  });

  it('should walk nested objects and stop at the first missing hop', () => {
    const value = { a: { b: { c: 7 } } };

    expect(dig(value, 'a', 'b', 'c')).toBe(7);
    expect(dig(value, 'a', 'x', 'c')).toBeUndefined();
    expect(dig([1, 2], '0')).toBeUndefined();
  });

  it('should resolve relative links against the origin', () => {
    expect(absoluteUrl('/qval/', 'https://funds.example.com')).toBe(
      'https://funds.example.com/qval/',
    );
    expect(absoluteUrl('https://other.example.com/x', 'https://funds.example.com')).toBe(
      'https://other.example.com/x',
    );
    expect(absoluteUrl(undefined, 'https://funds.example.com')).toBeNull();
  });
});

describe('collectRecords()', () => {
  it('should keep valid records and skip items mapped to null without counting them', () => {
    const result = collectRecords([1, 2, 3], (n) =>
      n === 2 ? null : sampleRecord({ ticker: `T${n}` }),
    );

    expect(result.records.map((r) => r.ticker)).toEqual(['T1', 'T3']);
    expect(result.dropped).toBe(0);
    expect(result.warnings).toEqual([]);
  });

  it('should count thrown items as dropped and keep their messages as warnings', () => {
    const result = collectRecords(['ok', 'bad'], (item) => {
      if (item === 'bad') throw new Error('item bad: no ticker');
      return sampleRecord();
    });

    expect(result.records).toHaveLength(1);
    expect(result.dropped).toBe(1);
    expect(result.warnings).toEqual(['item bad: no ticker']);
  });

  it('should drop records that fail the schema', () => {
    const result = collectRecords([0], () => sampleRecord({ navAmount: '1e5' }));

    expect(result.records).toEqual([]);
    expect(result.dropped).toBe(1);
    expect(result.warnings).toEqual(['ABCD: navAmount must be a decimal string']);
  });

  it('should keep the first record of a duplicated ticker', () => {
    const result = collectRecords(['first', 'second'], (fundName) => sampleRecord({ fundName }));

    expect(result.records).toHaveLength(1);
    expect(result.records[0].fundName).toBe('first');
    expect(result.dropped).toBe(1);
    expect(result.warnings).toEqual(['ABCD: duplicate ticker']);
  });

  it('should cap warnings and summarise the rest', () => {
    const items = Array.from({ length: 12 }, (_, i) => i);
    const result = collectRecords(items, (i) => {
      throw new Error(`item ${i}`);
    });

    expect(result.dropped).toBe(12);
    expect(result.warnings).toHaveLength(11);
    expect(result.warnings[9]).toBe('item 9');
    expect(result.warnings[10]).toBe('...and 2 more');
  });
});
