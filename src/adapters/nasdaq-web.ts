import { BaseAdapter, type RawDistributionRow } from './base-adapter.js';
import type { FetchTarget, SourceAdapterConfig } from '../types/adapter.js';
import type { FundSymbol } from '../types/fund.js';

/**
 * Nasdaq dividend-history page.
 *
 * The table is rendered client-side, so this source goes through the
 * browser fetcher and waits for the table before capturing the DOM.
 * A fund that has not paid yet renders the table with no rows.
 * Columns: Ex/EFF Date | Type | Cash Amount | Declaration Date | Record Date | Payment Date
 */
export class NasdaqWebAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'nasdaq-web',
    name: 'Nasdaq (dividend history page)',
    baseUrl: 'https://www.nasdaq.com',
    fetchMethod: 'browser',
  };

  target(symbol: FundSymbol): FetchTarget {
    return {
      url: `${this.config.baseUrl}/market-activity/etf/${symbol.toLowerCase()}/dividend-history`,
      waitForSelector: 'table',
    };
  }

  protected extractRows(content: string, symbol: FundSymbol): RawDistributionRow[] {
    return this.readTable(this.load(content), symbol, {
      exDate: ['ex/eff date', 'ex-date', 'ex date'],
      amount: ['cash amount'],
      payDate: ['payment date', 'pay date'],
    });
  }
}
