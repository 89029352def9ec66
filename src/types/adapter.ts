import type { DistributionRecord } from './distribution.js';
import type { FundSymbol } from './fund.js';

export type FetchMethod = 'http' | 'browser';

export const SOURCE_IDS = ['stockanalysis', 'nasdaq', 'nasdaq-web'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export interface FetchTarget {
  url: string;
  /** Browser only: wait for this selector before capturing the page. */
  waitForSelector?: string;
  /** Sent as the Accept header by the HTTP variant. */
  accept?: string;
}

export interface SourceAdapterConfig {
  id: SourceId;
  name: string;
  baseUrl: string;
  fetchMethod: FetchMethod;
}

export interface SourceAdapter {
  readonly config: SourceAdapterConfig;

  /** Where this source publishes the given fund's distribution history. */
  target(symbol: FundSymbol): FetchTarget;

  /** Parse raw page content into distributions. Throws ParseError. */
  parse(content: string, symbol: FundSymbol): DistributionRecord[];
}
