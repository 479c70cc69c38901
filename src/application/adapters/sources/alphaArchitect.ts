/**
 * Alpha Architect: the fund list is a plain HTML page.
 *
 * Every fund links to `/<ticker>` (3-5 letters). The page repeats those links
 * in its navigation, so the first occurrence of each ticker wins and later
 * ones are not counted as drops. Only ticker, name and URL are published.
 */
import * as cheerio from 'cheerio';

import { emptyFundRecord, type FundRecord } from '@domain/entities/FundRecord';
import type { ParseResult } from '@domain/interfaces/IDataSourceAdapter';
import { getText } from '@infrastructure/http/httpClient';

import type { AdapterDefinition } from '../defineAdapter';
import { absoluteUrl, collectRecords, emptyResult, textOrNull } from '../parsing';

export const ALPHA_ARCHITECT_NAME = 'Alpha Architect';
export const ALPHA_ARCHITECT_ORIGIN = 'https://funds.alphaarchitect.com';

const TICKER_LINK = /^\/([a-z]{3,5})\/?$/i;
const NAVIGATION_WORDS = new Set(['FUNDS', 'HOME', 'ABOUT', 'NEWS', 'BLOG']);

interface FundLink {
  ticker: string;
  href: string;
  label: string | null;
}

function fundLinks($: cheerio.CheerioAPI): FundLink[] {
  const links: FundLink[] = [];
  const seen = new Set<string>();

  for (const element of $('a[href]').toArray()) {
    const anchor = $(element);
    const href = anchor.attr('href') ?? '';
    const match = TICKER_LINK.exec(href);
    if (!match) continue;

    const ticker = match[1].toUpperCase();
    if (NAVIGATION_WORDS.has(ticker) || seen.has(ticker)) continue;
    seen.add(ticker);

    links.push({
      ticker,
      href,
      label: textOrNull(anchor.text()) ?? textOrNull(anchor.attr('title')),
    });
  }
  return links;
}

function toRecord(link: FundLink): FundRecord {
  const productPageUrl = absoluteUrl(link.href, ALPHA_ARCHITECT_ORIGIN);
  if (!productPageUrl) throw new Error(`${link.ticker}: unusable link ${link.href}`);

  return {
    ...emptyFundRecord({ ticker: link.ticker, fundName: link.label ?? link.ticker, productPageUrl }),
    region: 'US',
    marketType: 'ETF',
    detailPageUrl: productPageUrl,
  };
}

export function parseAlphaArchitectPage(html: string): ParseResult {
  if (!html.trim()) return emptyResult('Alpha Architect page is empty');
  return collectRecords(fundLinks(cheerio.load(html)), toRecord);
}

export const alphaArchitectSource: AdapterDefinition<string> = {
  name: ALPHA_ARCHITECT_NAME,
  fetch: ({ http }) => getText(http, `${ALPHA_ARCHITECT_ORIGIN}/`),
  parse: parseAlphaArchitectPage,
};
