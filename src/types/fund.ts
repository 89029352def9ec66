import type { SourceId } from './adapter.js';

export const FUND_SYMBOLS = ['YBTC', 'BTCI', 'QQQI', 'IWMI', 'IAUI', 'KQQQ', 'MSTW', 'WPAY'] as const;

export type FundSymbol = (typeof FUND_SYMBOLS)[number];

export type DistributionFrequency = 'weekly' | 'monthly';

export interface FundCatalogEntry {
  symbol: FundSymbol;
  name: string;
  frequency: DistributionFrequency;
  /** Human description of when the fund declares, e.g. '3rd Tuesday' */
  declareDay: string;
  /** Tried in order until one yields distributions. */
  sources: readonly SourceId[];
}
