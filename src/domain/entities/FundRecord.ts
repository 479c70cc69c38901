/**
 * FundRecord Entity — The Normalized Listing Row
 * Layer: Domain
 *
 * One ETF listing as every adapter must produce it, whatever the upstream
 * shape (product-screener JSON, GraphQL, scraped HTML). The schema is the
 * contract: adapters map their raw items into this shape and
 * `collectRecords()` drops anything that fails it.
 *
 * Money and percentages are exact decimal strings ("31.45", "-0.12"), never
 * JS numbers: 0.1 + 0.2 must not leak into an expense ratio. Every numeric
 * field is nullable on its own because source coverage varies: iShares
 * publishes ten-year returns, an HTML fund list publishes nothing but a
 * ticker and a name.
 */
import { z } from 'zod/v4';

export const DISTRIBUTION_FREQUENCIES = [
  'Weekly',
  'Monthly',
  'Quarterly',
  'Semi-Annual',
  'Annual',
  'Variable',
  'None',
  'Unknown',
] as const;

export type DistributionFrequency = (typeof DISTRIBUTION_FREQUENCIES)[number];

export const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

const decimal = z.string().regex(DECIMAL_PATTERN, { message: 'must be a decimal string' });
const isoDate = z.iso.date();

export const fundRecordSchema = z.object({
  ticker: z
    .string()
    .min(1)
    .max(12)
    .regex(/^[A-Z0-9][A-Z0-9.-]*$/, { message: 'ticker must be upper-case alphanumeric' }),
  fundName: z.string().min(1),
  isin: z.string().min(1).nullable(),
  cusip: z.string().min(1).nullable(),
  inceptionDate: isoDate.nullable(),

  navAmount: decimal.nullable(),
  navAsOf: isoDate.nullable(),
  expenseRatio: decimal.nullable(),

  ytdReturn: decimal.nullable(),
  oneYearReturn: decimal.nullable(),
  threeYearReturn: decimal.nullable(),
  fiveYearReturn: decimal.nullable(),
  tenYearReturn: decimal.nullable(),
  sinceInceptionReturn: decimal.nullable(),

  assetClass: z.string().min(1).nullable(),
  region: z.string().min(1).nullable(),
  marketType: z.string().min(1).nullable(),

  distributionYield: decimal.nullable(),
  distributionFrequency: z.enum(DISTRIBUTION_FREQUENCIES),

  productPageUrl: z.url(),
  detailPageUrl: z.url().nullable(),
});

export type FundRecord = z.infer<typeof fundRecordSchema>;

/**
 * Builds a record with every optional field null, so adapters only spell out
 * what their source actually provides.
 */
export function emptyFundRecord(
  required: Pick<FundRecord, 'ticker' | 'fundName' | 'productPageUrl'>,
): FundRecord {
  return {
    ...required,
    isin: null,
    cusip: null,
    inceptionDate: null,
    navAmount: null,
    navAsOf: null,
    expenseRatio: null,
    ytdReturn: null,
    oneYearReturn: null,
    threeYearReturn: null,
    fiveYearReturn: null,
    tenYearReturn: null,
    sinceInceptionReturn: null,
    assetClass: null,
    region: null,
    marketType: null,
    distributionYield: null,
    distributionFrequency: 'Unknown',
    detailPageUrl: null,
  };
}
