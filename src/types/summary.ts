import type { SourceId } from './adapter.js';
import type { FundSymbol } from './fund.js';

export interface FundOutcome {
  symbol: FundSymbol;
  source: SourceId;
  found: number;
  inserted: number;
  updated: number;
  unchanged: number;
}

export interface SourceFailure {
  source: SourceId;
  code: string;
  message: string;
}

export interface FundFailure {
  symbol: FundSymbol;
  errors: SourceFailure[];
}

export interface BatchSummary {
  started_at: string;
  finished_at: string;
  succeeded: FundOutcome[];
  failed: FundFailure[];
}
