/**
 * Goldman Sachs: GraphQL fund list.
 *
 * One POST of the `getFunds` query returns every fund with its share
 * classes. Only ETFs are kept and each share class with a ticker becomes its
 * own record. The endpoint publishes annualised returns only, so
 * `ytdReturn` stays null.
 */
import { emptyFundRecord, type FundRecord } from '@domain/entities/FundRecord';
import type { ParseResult } from '@domain/interfaces/IDataSourceAdapter';
import { postJson } from '@infrastructure/http/httpClient';

import type { AdapterDefinition } from '../defineAdapter';
import {
  collectRecords,
  dig,
  emptyResult,
  isRecord,
  normalizeTicker,
  textOrNull,
  toDecimal,
  toFrequency,
  toIsoDate,
} from '../parsing';

export const GOLDMAN_SACHS_NAME = 'Goldman Sachs';
export const GOLDMAN_SACHS_GRAPHQL_URL = 'https://am.gs.com/services/funds';
const PRODUCT_PAGE_BASE = 'https://am.gs.com/en-us/institutions/products';

const GET_FUNDS_QUERY = `
  query getFunds($fundRequest: FundRequest) {
    fundData(fundRequest: $fundRequest) {
      funds {
        fundName
        fundType
        shareClasses {
          shareClassId
          ticker
          shareClassInceptionDate
          distributionFrequency
          dailyPerformance { nav { asAtDate value } }
          monthlyPerformance {
            asAtDate
            annualisedReturns1yr
            annualisedReturns3yr
            annualisedReturns5yr
            annualisedReturns10yr
            annualisedReturnsSinceIncept
          }
        }
      }
    }
  }
`;

export const GET_FUNDS_REQUEST = {
  operationName: 'getFunds',
  query: GET_FUNDS_QUERY,
  variables: {
    fundRequest: {
      country: 'us',
      language: 'en',
      audience: 'institutions',
      disabledFunds: [],
      limit: 500,
      offset: 0,
      sortBy: 'FN',
      sortOrder: 'ASC',
      filterParam: { searchText: '' },
    },
  },
};

interface ShareClassItem {
  fundName: unknown;
  shareClass: unknown;
}

function* etfShareClasses(funds: unknown[]): Generator<ShareClassItem> {
  for (const fund of funds) {
    if (!isRecord(fund) || fund.fundType !== 'ETF') continue;
    const shareClasses = Array.isArray(fund.shareClasses) ? fund.shareClasses : [];
    for (const shareClass of shareClasses) {
      yield { fundName: fund.fundName, shareClass };
    }
  }
}

function toRecord({ fundName, shareClass }: ShareClassItem): FundRecord | null {
  if (!isRecord(shareClass) || textOrNull(shareClass.ticker) === null) return null;

  const ticker = normalizeTicker(shareClass.ticker);
  const name = textOrNull(fundName);
  if (!ticker || !name) {
    throw new Error(`share class ${String(shareClass.ticker)}: unusable ticker or fund name`);
  }

  const monthly = (key: string): string | null =>
    toDecimal(dig(shareClass, 'monthlyPerformance', key));
  const productPageUrl = `${PRODUCT_PAGE_BASE}/${ticker}`;

  return {
    ...emptyFundRecord({ ticker, fundName: name, productPageUrl }),
    inceptionDate: toIsoDate(shareClass.shareClassInceptionDate),
    navAmount: toDecimal(dig(shareClass, 'dailyPerformance', 'nav', 'value')),
    navAsOf: toIsoDate(dig(shareClass, 'dailyPerformance', 'nav', 'asAtDate')),
    oneYearReturn: monthly('annualisedReturns1yr'),
    threeYearReturn: monthly('annualisedReturns3yr'),
    fiveYearReturn: monthly('annualisedReturns5yr'),
    tenYearReturn: monthly('annualisedReturns10yr'),
    sinceInceptionReturn: monthly('annualisedReturnsSinceIncept'),
    region: 'US',
    marketType: 'ETF',
    distributionFrequency: toFrequency(shareClass.distributionFrequency),
    detailPageUrl: productPageUrl,
  };
}

function graphqlErrors(raw: unknown): string[] {
  const errors = dig(raw, 'errors');
  if (!Array.isArray(errors)) return [];
  return errors.map((error) => `GraphQL error: ${textOrNull(dig(error, 'message')) ?? 'unknown'}`);
}

export function parseGoldmanSachsFunds(raw: unknown): ParseResult {
  const errors = graphqlErrors(raw);
  const funds = dig(raw, 'data', 'fundData', 'funds');
  if (!Array.isArray(funds)) {
    const [first] = errors;
    return emptyResult(first ?? 'Goldman Sachs response has no fund list');
  }

  const result = collectRecords(etfShareClasses(funds), toRecord);
  return { ...result, warnings: [...errors, ...result.warnings] };
}

export const goldmanSachsSource: AdapterDefinition<unknown> = {
  name: GOLDMAN_SACHS_NAME,
  fetch: ({ http }) => postJson(http, GOLDMAN_SACHS_GRAPHQL_URL, GET_FUNDS_REQUEST),
  parse: parseGoldmanSachsFunds,
};
