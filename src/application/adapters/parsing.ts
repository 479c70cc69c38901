/**
 * Parsing Helpers Shared by Every Adapter
 * Layer: Application (adapters)
 *
 * Upstream payloads are untyped and inconsistent: "$31.45", 31.45, "0.06%",
 * "--", "Oct 20, 2011", "2011-10-20T00:00:00". These helpers turn such values
 * into the FundRecord field formats or null, and never throw.
 *
 * `collectRecords()` is the one place items become records: it runs the
 * adapter's per-item mapper, validates the result against the FundRecord
 * schema, drops duplicates (first ticker wins), and counts every item it had
 * to drop instead of failing the whole payload.
 */
import { DECIMAL_PATTERN, type DistributionFrequency, type FundRecord, fundRecordSchema } from '@domain/entities/FundRecord';
import type { ParseResult } from '@domain/interfaces/IDataSourceAdapter';

const PLACEHOLDERS = new Set(['', '-', '--', 'n/a', 'na']);
const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9.-]{0,11}$/;
const MAX_WARNINGS = 10;

const MONTHS: Record<string, string> = {
  jan: '01',
  feb: '02',
  mar: '03',
  apr: '04',
  may: '05',
  jun: '06',
  jul: '07',
  aug: '08',
  sep: '09',
  oct: '10',
  nov: '11',
  dec: '12',
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks nested objects; any missing or non-object hop yields undefined. */
export function dig(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function textOrNull(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();
  return PLACEHOLDERS.has(text.toLowerCase()) ? null : text;
}

export function normalizeTicker(value: unknown): string | null {
  const text = textOrNull(value);
  if (text === null) return null;
  const ticker = text.toUpperCase();
  return TICKER_PATTERN.test(ticker) ? ticker : null;
}

/**
 * Exact decimal string or null. Numbers are taken at their JS string form;
 * exponent forms (1e-7) are refused rather than rounded.
 */
export function toDecimal(value: unknown): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const text = String(value);
    return DECIMAL_PATTERN.test(text) ? text : null;
  }

  const text = textOrNull(value);
  if (text === null) return null;

  let cleaned = text.replace(/[$,%\s]/g, '');
  if (cleaned.startsWith('+')) cleaned = cleaned.slice(1);
  if (cleaned.startsWith('.')) cleaned = `0${cleaned}`;
  if (cleaned.startsWith('-.')) cleaned = `-0${cleaned.slice(1)}`;
  if (cleaned.endsWith('.')) cleaned = cleaned.slice(0, -1);

  return DECIMAL_PATTERN.test(cleaned) ? cleaned : null;
}

function calendarDate(year: string, month: string, day: string): string | null {
  const iso = `${year}-${month}-${day}`;
  const date = new Date(`${iso}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(iso) ? iso : null;
}

/** Accepts `2011-10-20[...]`, `Oct 20, 2011` / `October 20, 2011`, and `10/20/2011`. */
export function toIsoDate(value: unknown): string | null {
  const text = textOrNull(value);
  if (text === null) return null;

  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(text);
  if (iso) return calendarDate(iso[1], iso[2], iso[3]);

  const named = /^([A-Za-z]{3})[a-z]*\.?\s+(\d{1,2}),\s*(\d{4})$/.exec(text);
  if (named) {
    const month = MONTHS[named[1].toLowerCase()];
    return month ? calendarDate(named[3], month, named[2].padStart(2, '0')) : null;
  }

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (us) return calendarDate(us[3], us[1].padStart(2, '0'), us[2].padStart(2, '0'));

  return null;
}

export function toFrequency(value: unknown): DistributionFrequency {
  const text = textOrNull(value)?.toUpperCase();
  if (!text) return 'Unknown';

  if (text.includes('WEEK')) return 'Weekly';
  if (text.includes('MONTH')) return 'Monthly';
  if (text.includes('QUARTER')) return 'Quarterly';
  if (text.includes('SEMI') || text.includes('HALF')) return 'Semi-Annual';
  if (text.includes('ANNUAL') || text.includes('YEAR')) return 'Annual';
  if (text.includes('VARIABLE')) return 'Variable';
  if (text === 'NONE' || text.includes('NO DISTRIBUTION')) return 'None';
  return 'Unknown';
}

export function absoluteUrl(href: unknown, origin: string): string | null {
  const text = textOrNull(href);
  if (text === null) return null;
  try {
    return new URL(text, origin).toString();
  } catch {
    return null;
  }
}

export function emptyResult(warning: string): ParseResult {
  return { records: [], dropped: 0, warnings: [warning] };
}

/**
 * Maps items to records. `mapItem` returns null for items that are simply
 * not listings (a mutual fund in an ETF feed) and throws for items that
 * should have been listings but are malformed; only the latter count as
 * dropped.
 */
export function collectRecords<T>(
  items: Iterable<T>,
  mapItem: (item: T) => FundRecord | null,
): ParseResult {
  const records: FundRecord[] = [];
  const seen = new Set<string>();
  const reasons: string[] = [];
  let dropped = 0;

  const drop = (reason: string): void => {
    dropped++;
    if (reasons.length < MAX_WARNINGS) reasons.push(reason);
  };

  for (const item of items) {
    let mapped: FundRecord | null;
    try {
      mapped = mapItem(item);
    } catch (err) {
      drop(err instanceof Error ? err.message : String(err));
      continue;
    }
    if (mapped === null) continue;

    const parsed = fundRecordSchema.safeParse(mapped);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.map(String).join('.')} ${issue.message}`)
        .join('; ');
      drop(`${mapped.ticker}: ${issues}`);
      continue;
    }

    if (seen.has(parsed.data.ticker)) {
      drop(`${parsed.data.ticker}: duplicate ticker`);
      continue;
    }

    seen.add(parsed.data.ticker);
    records.push(parsed.data);
  }

  const warnings =
    dropped > reasons.length ? [...reasons, `...and ${dropped - reasons.length} more`] : reasons;
  return { records, dropped, warnings };
}
