import type { FundSymbol } from './fund.js';

/** One declared distribution. Unique by (fund_symbol, ex_date). */
export interface DistributionRecord {
  fund_symbol: FundSymbol;
  /** ISO date, e.g. '2024-01-15' */
  ex_date: string;
  /** ISO date, null when the source does not state it */
  pay_date: string | null;
  /** USD per share */
  amount: number;
}

/** What the history file keeps for each distribution. */
export interface StoredDistribution extends DistributionRecord {
  source: string;
  scraped_at: string;
}

export interface DistributionFilter {
  fundSymbol?: FundSymbol;
  /** Inclusive ISO date */
  from?: string;
  /** Inclusive ISO date */
  to?: string;
  /** Keep only the most recent N (result stays ascending) */
  limit?: number;
}

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';

export interface UpsertCounts {
  inserted: number;
  updated: number;
  unchanged: number;
}
