import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ParseError } from '../errors.js';
import { dedupeDistributions } from '../pipeline/dedup.js';
import type { FetchTarget, SourceAdapter, SourceAdapterConfig } from '../types/adapter.js';
import type { DistributionRecord } from '../types/distribution.js';
import type { FundSymbol } from '../types/fund.js';
import { isBlank, parseAmount, parseDate } from '../utils/date.js';

/** Raw cell text for one distribution row. */
export interface RawDistributionRow {
  exDate: string;
  amount: string;
  payDate: string | null;
}

/** Header labels (lowercase, substring match) that identify each column. */
export interface ColumnLabels {
  exDate: string[];
  amount: string[];
  payDate: string[];
}

function normalizeHeader(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

function findColumn(headers: string[], labels: string[]): number {
  return headers.findIndex((h) => labels.some((label) => h.includes(label)));
}

export abstract class BaseAdapter implements SourceAdapter {
  abstract readonly config: SourceAdapterConfig;
  abstract target(symbol: FundSymbol): FetchTarget;
  protected abstract extractRows(content: string, symbol: FundSymbol): RawDistributionRow[];

  parse(content: string, symbol: FundSymbol): DistributionRecord[] {
    const rows = this.extractRows(content, symbol);
    return dedupeDistributions(rows.map((row) => this.toRecord(row, symbol)));
  }

  protected load(html: string): CheerioAPI {
    return cheerio.load(html);
  }

  protected fail(message: string, symbol: FundSymbol, cause?: unknown): ParseError {
    return new ParseError(message, this.config.id, symbol, cause === undefined ? undefined : { cause });
  }

  /**
   * Finds the first table whose header row names the ex-date and amount
   * columns, and returns its data rows as raw cell text.
   */
  protected readTable($: CheerioAPI, symbol: FundSymbol, labels: ColumnLabels): RawDistributionRow[] {
    const tables = $('table');
    if (tables.length === 0) {
      throw this.fail('no distribution table found', symbol);
    }

    for (const table of tables.toArray()) {
      const headers = $(table)
        .find('tr')
        .first()
        .find('th, td')
        .map((_i, cell) => normalizeHeader($(cell).text()))
        .get();

      const exIdx = findColumn(headers, labels.exDate);
      const amountIdx = findColumn(headers, labels.amount);
      if (exIdx === -1 || amountIdx === -1) continue;
      const payIdx = findColumn(headers, labels.payDate);

      const rows: RawDistributionRow[] = [];
      $(table)
        .find('tr')
        .slice(1)
        .each((_i, tr) => {
          const cells = $(tr)
            .find('td')
            .map((_j, td) => $(td).text().trim())
            .get();
          if (cells.length === 0) return;

          rows.push({
            exDate: cells[exIdx] ?? '',
            amount: cells[amountIdx] ?? '',
            payDate: payIdx === -1 ? null : (cells[payIdx] ?? null),
          });
        });
      return rows;
    }

    throw this.fail('distribution table is missing the ex-date or amount column', symbol);
  }

  protected toRecord(row: RawDistributionRow, symbol: FundSymbol): DistributionRecord {
    const exDate = parseDate(row.exDate);
    if (!exDate) {
      throw this.fail(`invalid ex-dividend date "${row.exDate}"`, symbol);
    }

    const amount = parseAmount(row.amount);
    if (amount === null) {
      throw this.fail(`invalid amount "${row.amount}" for ${exDate}`, symbol);
    }
    if (amount < 0) {
      throw this.fail(`negative amount ${amount} for ${exDate}`, symbol);
    }

    let payDate: string | null = null;
    if (row.payDate !== null && !isBlank(row.payDate)) {
      payDate = parseDate(row.payDate);
      if (!payDate) {
        throw this.fail(`invalid pay date "${row.payDate}" for ${exDate}`, symbol);
      }
      if (payDate < exDate) {
        throw this.fail(`pay date ${payDate} precedes ex-dividend date ${exDate}`, symbol);
      }
    }

    return { fund_symbol: symbol, ex_date: exDate, pay_date: payDate, amount };
  }
}
