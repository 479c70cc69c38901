/**
 * iShares: product-screener JSON.
 *
 * The screener answers with one object keyed by portfolio id. Numeric values
 * come wrapped as `{ r: <raw number>, d: <display text> }` and dates as
 * `{ d: "Oct 20, 2011" }`. Returns prefer the quarter-end NAV figures and
 * fall back to the price-based ones.
 */
import { emptyFundRecord, type FundRecord } from '@domain/entities/FundRecord';
import type { ParseResult } from '@domain/interfaces/IDataSourceAdapter';
import { getJson } from '@infrastructure/http/httpClient';

import type { AdapterDefinition } from '../defineAdapter';
import {
  absoluteUrl,
  collectRecords,
  dig,
  emptyResult,
  isRecord,
  normalizeTicker,
  textOrNull,
  toDecimal,
  toIsoDate,
} from '../parsing';

export const ISHARES_NAME = 'iShares';
export const ISHARES_ORIGIN = 'https://www.ishares.com';
export const ISHARES_SCREENER_URL = `${ISHARES_ORIGIN}/us/product-screener/product-screener-v3.1.jsn`;

const SCREENER_PARAMS = {
  dcrPath:
    '/templatedata/config/product-screener-v3/data/en/us-ishares/ishares-product-screener-backend-config',
  siteEntryPassthrough: 'true',
};

type Item = Record<string, unknown>;

const rawValue = (item: Item, key: string): string | null => toDecimal(dig(item, key, 'r'));
const displayDate = (item: Item, key: string): string | null => toIsoDate(dig(item, key, 'd'));

function periodReturn(item: Item, period: string): string | null {
  return rawValue(item, `quarterlyNav${period}`) ?? rawValue(item, `price${period}`);
}

function toRecord(portfolioId: string, item: unknown): FundRecord {
  if (!isRecord(item)) {
    throw new Error(`portfolio ${portfolioId}: entry is not an object`);
  }

  const ticker = normalizeTicker(item.localExchangeTicker);
  const fundName = textOrNull(item.fundName);
  const productPageUrl = absoluteUrl(item.productPageUrl, ISHARES_ORIGIN);
  if (!ticker || !fundName || !productPageUrl) {
    throw new Error(`portfolio ${portfolioId}: missing ticker, fund name or product page`);
  }

  return {
    ...emptyFundRecord({ ticker, fundName, productPageUrl }),
    isin: textOrNull(item.isin),
    cusip: textOrNull(item.cusip),
    inceptionDate: displayDate(item, 'inceptionDate'),
    navAmount: rawValue(item, 'navAmount'),
    navAsOf: displayDate(item, 'navAmountAsOf'),
    expenseRatio: rawValue(item, 'fees'),
    ytdReturn: periodReturn(item, 'YearToDate'),
    oneYearReturn: periodReturn(item, 'OneYearAnnualized'),
    threeYearReturn: periodReturn(item, 'ThreeYearAnnualized'),
    fiveYearReturn: periodReturn(item, 'FiveYearAnnualized'),
    tenYearReturn: periodReturn(item, 'TenYearAnnualized'),
    sinceInceptionReturn: periodReturn(item, 'SinceInceptionAnnualized'),
    assetClass: textOrNull(item.aladdinAssetClass),
    region: textOrNull(item.aladdinRegion),
    marketType: textOrNull(item.aladdinMarketType),
    distributionYield: rawValue(item, 'distributionYield'),
    detailPageUrl: productPageUrl,
  };
}

export function parseISharesScreener(raw: unknown): ParseResult {
  if (!isRecord(raw)) {
    return emptyResult('iShares screener payload is not an object keyed by portfolio id');
  }
  return collectRecords(Object.entries(raw), ([portfolioId, item]) => toRecord(portfolioId, item));
}

export const isharesSource: AdapterDefinition<unknown> = {
  name: ISHARES_NAME,
  fetch: ({ http }) => getJson(http, ISHARES_SCREENER_URL, SCREENER_PARAMS),
  parse: parseISharesScreener,
};
