import { z } from 'zod';
import { BaseAdapter, type RawDistributionRow } from './base-adapter.js';
import type { FetchTarget, SourceAdapterConfig } from '../types/adapter.js';
import type { FundSymbol } from '../types/fund.js';

const dividendRowSchema = z.object({
  exOrEffDate: z.string(),
  amount: z.string(),
  paymentDate: z.string().nullish(),
});

const responseSchema = z.object({
  data: z
    .object({
      dividends: z
        .object({
          rows: z.array(dividendRowSchema).nullable(),
        })
        .nullable(),
    })
    .nullable(),
});

/**
 * Nasdaq quote API.
 *
 * GET /api/quote/{SYMBOL}/dividends?assetclass=etf returns JSON:
 *   { data: { dividends: { rows: [{ exOrEffDate: '01/15/2024', amount: '$0.25', paymentDate: '01/18/2024', ... }] } } }
 * rows is null for funds that have not paid yet; data is null for unknown symbols.
 */
export class NasdaqAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'nasdaq',
    name: 'Nasdaq',
    baseUrl: 'https://api.nasdaq.com',
    fetchMethod: 'http',
  };

  target(symbol: FundSymbol): FetchTarget {
    return {
      url: `${this.config.baseUrl}/api/quote/${symbol}/dividends?assetclass=etf`,
      accept: 'application/json, text/plain, */*',
    };
  }

  protected extractRows(content: string, symbol: FundSymbol): RawDistributionRow[] {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw this.fail('response is not JSON', symbol, err);
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw this.fail(`unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, symbol, parsed.error);
    }

    const dividends = parsed.data.data?.dividends;
    if (!dividends) {
      throw this.fail('response has no dividends section', symbol);
    }

    return (dividends.rows ?? []).map((row) => ({
      exDate: row.exOrEffDate,
      amount: row.amount,
      payDate: row.paymentDate ?? null,
    }));
  }
}
