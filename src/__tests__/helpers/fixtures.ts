/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * sample* = one complete object. Upstream payloads are trimmed-down
 * hand-written imitations of each source's shape, not captured responses.
 */
import { emptyFundRecord, type FundRecord } from '@domain/entities/FundRecord';

export function sampleRecord(overrides: Partial<FundRecord> = {}): FundRecord {
  return {
    ...emptyFundRecord({
      ticker: 'ABCD',
      fundName: 'Sample Value ETF',
      productPageUrl: 'https://funds.example.com/abcd',
    }),
    navAmount: '25.10',
    expenseRatio: '0.49',
    distributionFrequency: 'Quarterly',
    ...overrides,
  };
}

/** `count` valid records with tickers F0000, F0001, ... */
export function sampleRecords(count: number, fundName = 'Sample Fund'): FundRecord[] {
  return Array.from({ length: count }, (_, i) =>
    sampleRecord({ ticker: `F${String(i).padStart(4, '0')}`, fundName }),
  );
}

/**
 * Records whose compact JSON is exactly 120 bytes:
 *   {"ticker":"F0000","fundName":"<88 x N>"}
 * = 11 + 7 + 12 + 88 + 2 = 120.
 */
export function fixedSizeItems(count: number): { ticker: string; fundName: string }[] {
  return Array.from({ length: count }, (_, i) => ({
    ticker: `F${String(i).padStart(4, '0')}`,
    fundName: 'N'.repeat(88),
  }));
}

export const sampleISharesPayload = {
  '239726': {
    localExchangeTicker: 'IVV',
    fundName: 'iShares Core S&P 500 ETF',
    isin: 'US4642872000',
    cusip: '464287200',
    inceptionDate: { d: 'May 15, 2000', r: 20000515 },
    navAmount: { d: '512.34', r: 512.34 },
    navAmountAsOf: { d: 'Oct 20, 2025', r: 20251020 },
    fees: { d: '0.03', r: 0.03 },
    quarterlyNavYearToDate: { d: '5.12', r: 5.12 },
    priceYearToDate: { d: '5.20', r: 5.2 },
    quarterlyNavOneYearAnnualized: { d: '-', r: null },
    priceOneYearAnnualized: { d: '24.01', r: 24.01 },
    aladdinAssetClass: 'Equity',
    aladdinRegion: 'North America',
    aladdinMarketType: 'Developed',
    distributionYield: { d: '1.25', r: 1.25 },
    productPageUrl: '/us/products/239726/ishares-core-sp-500-etf',
  },
  '239600': {
    localExchangeTicker: 'agg',
    fundName: 'iShares Core U.S. Aggregate Bond ETF',
    productPageUrl: '/us/products/239458/ishares-core-total-us-bond-market-etf',
  },
  '111111': {
    localExchangeTicker: '',
    fundName: 'Ticker Missing Fund',
    productPageUrl: '/us/products/111111',
  },
};

export const sampleGoldmanSachsPayload = {
  data: {
    fundData: {
      funds: [
        {
          fundName: 'Goldman Sachs ActiveBeta U.S. Large Cap Equity ETF',
          fundType: 'ETF',
          shareClasses: [
            {
              shareClassId: 'SC-1',
              ticker: 'GSLC',
              shareClassInceptionDate: '2015-09-17',
              distributionFrequency: 'Quarterly',
              dailyPerformance: { nav: { asAtDate: '2025-10-17', value: 118.42 } },
              monthlyPerformance: {
                annualisedReturns1yr: '18.5',
                annualisedReturns3yr: 12.25,
                annualisedReturns5yr: null,
                annualisedReturns10yr: '--',
                annualisedReturnsSinceIncept: 11.9,
              },
            },
            { shareClassId: 'SC-2', ticker: null },
          ],
        },
        {
          fundName: 'Goldman Sachs Government Fund',
          fundType: 'MUTUAL_FUND',
          shareClasses: [{ shareClassId: 'SC-3', ticker: 'FGTXX' }],
        },
      ],
    },
  },
};

export const sampleAlphaArchitectHtml = `
<html>
  <body>
    <nav>
      <a href="/funds/">Funds</a>
      <a href="/about">About</a>
      <a href="/qval/">QVAL</a>
    </nav>
    <main>
      <a href="/qval">U.S. Quantitative Value ETF</a>
      <a href="/ival" title="International Quantitative Value ETF"></a>
      <a href="/vmot/">Value Momentum Trend ETF</a>
      <a href="https://example.com/elsewhere">Elsewhere</a>
      <a href="/documents/prospectus.pdf">Prospectus</a>
    </main>
  </body>
</html>
`;
