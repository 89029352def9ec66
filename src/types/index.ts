export type {
  DistributionRecord,
  StoredDistribution,
  DistributionFilter,
  UpsertOutcome,
  UpsertCounts,
} from './distribution.js';
export type {
  SourceAdapter,
  SourceAdapterConfig,
  SourceId,
  FetchMethod,
  FetchTarget,
} from './adapter.js';
export { FUND_SYMBOLS } from './fund.js';
export { SOURCE_IDS } from './adapter.js';
export type { FundSymbol, FundCatalogEntry, DistributionFrequency } from './fund.js';
export type { PageFetcher, FetcherSet } from './fetcher.js';
export type { BatchSummary, FundOutcome, FundFailure, SourceFailure } from './summary.js';
