import { BaseAdapter, type RawDistributionRow } from './base-adapter.js';
import type { FetchTarget, SourceAdapterConfig } from '../types/adapter.js';
import type { FundSymbol } from '../types/fund.js';

/**
 * StockAnalysis adapter.
 *
 * Server-rendered dividend history at /etf/{symbol}/dividend/.
 *   - One <table> with header: Ex-Dividend Date | Cash Amount | Record Date | Pay Date
 *   - Dates as "Jan 15, 2024", amounts as "$0.2500"
 *   - Most recent distribution first
 */
export class StockAnalysisAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'stockanalysis',
    name: 'StockAnalysis',
    baseUrl: 'https://stockanalysis.com',
    fetchMethod: 'http',
  };

  target(symbol: FundSymbol): FetchTarget {
    return { url: `${this.config.baseUrl}/etf/${symbol.toLowerCase()}/dividend/` };
  }

  protected extractRows(content: string, symbol: FundSymbol): RawDistributionRow[] {
    return this.readTable(this.load(content), symbol, {
      exDate: ['ex-dividend date', 'ex-date'],
      amount: ['cash amount', 'amount'],
      payDate: ['pay date', 'payment date'],
    });
  }
}
