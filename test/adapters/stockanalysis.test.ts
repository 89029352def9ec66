import { describe, it, expect } from 'vitest';
import { StockAnalysisAdapter } from '../../src/adapters/stockanalysis.js';
import { ParseError } from '../../src/errors.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('StockAnalysisAdapter', () => {
  const adapter = new StockAnalysisAdapter();

  it('should have correct config', () => {
    expect(adapter.config.id).toBe('stockanalysis');
    expect(adapter.config.fetchMethod).toBe('http');
    expect(adapter.target('QQQI')).toEqual({ url: 'https://stockanalysis.com/etf/qqqi/dividend/' });
  });

  it('should parse the dividend table, skipping unrelated tables', () => {
    const records = adapter.parse(loadFixture('stockanalysis', 'ybtc-dividend.html'), 'YBTC');

    expect(records).toEqual([
      { fund_symbol: 'YBTC', ex_date: '2024-01-23', pay_date: '2024-01-26', amount: 0.4512 },
      { fund_symbol: 'YBTC', ex_date: '2024-01-16', pay_date: '2024-01-19', amount: 0.41 },
      { fund_symbol: 'YBTC', ex_date: '2024-01-09', pay_date: '2024-01-12', amount: 0.3875 },
    ]);
  });

  it('should produce unique ex-dates per page', () => {
    const records = adapter.parse(loadFixture('stockanalysis', 'ybtc-dividend.html'), 'YBTC');
    const keys = records.map((r) => `${r.fund_symbol}|${r.ex_date}`);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it('should parse a single distribution', () => {
    const records = adapter.parse(loadFixture('stockanalysis', 'qqqi-dividend.html'), 'QQQI');
    expect(records).toEqual([
      { fund_symbol: 'QQQI', ex_date: '2024-01-15', pay_date: '2024-01-18', amount: 0.25 },
    ]);
  });

  it('should return empty array for a table with no rows', () => {
    expect(adapter.parse(loadFixture('stockanalysis', 'empty-dividend.html'), 'KQQQ')).toEqual([]);
  });

  it('should represent an unknown pay date as null', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th><th>Record Date</th><th>Pay Date</th></tr>
      <tr><td>Feb 20, 2024</td><td>$0.5100</td><td>n/a</td><td>n/a</td></tr>
    </table>`;
    expect(adapter.parse(html, 'IWMI')).toEqual([
      { fund_symbol: 'IWMI', ex_date: '2024-02-20', pay_date: null, amount: 0.51 },
    ]);
  });

  it('should throw ParseError when the amount column holds a date', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th><th>Pay Date</th></tr>
      <tr><td>Jan 15, 2024</td><td>Jan 18, 2024</td><td>Jan 18, 2024</td></tr>
    </table>`;
    expect(() => adapter.parse(html, 'QQQI')).toThrow(
      '[stockanalysis:QQQI] invalid amount "Jan 18, 2024" for 2024-01-15',
    );
  });

  it('should throw ParseError for empty HTML', () => {
    expect(() => adapter.parse('<html><body></body></html>', 'QQQI')).toThrow(ParseError);
    expect(() => adapter.parse('<html><body></body></html>', 'QQQI')).toThrow(
      '[stockanalysis:QQQI] no distribution table found',
    );
  });

  it('should throw ParseError when the expected columns are gone', () => {
    expect(() => adapter.parse(loadFixture('stockanalysis', 'redesigned.html'), 'QQQI')).toThrow(
      '[stockanalysis:QQQI] distribution table is missing the ex-date or amount column',
    );
  });

  it('should throw ParseError for an unparseable date', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th><th>Pay Date</th></tr>
      <tr><td>Soon</td><td>$0.25</td><td>Jan 18, 2024</td></tr>
    </table>`;
    expect(() => adapter.parse(html, 'QQQI')).toThrow('invalid ex-dividend date "Soon"');
  });

  it('should throw ParseError for an unparseable amount', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th><th>Pay Date</th></tr>
      <tr><td>Jan 15, 2024</td><td>TBD</td><td>Jan 18, 2024</td></tr>
    </table>`;
    expect(() => adapter.parse(html, 'QQQI')).toThrow('invalid amount "TBD" for 2024-01-15');
  });

  it('should reject a pay date before the ex-dividend date', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th><th>Pay Date</th></tr>
      <tr><td>Jan 15, 2024</td><td>$0.25</td><td>Jan 12, 2024</td></tr>
    </table>`;
    expect(() => adapter.parse(html, 'QQQI')).toThrow(
      'pay date 2024-01-12 precedes ex-dividend date 2024-01-15',
    );
  });

  it('should reject a negative amount', () => {
    const html = `<table>
      <tr><th>Ex-Dividend Date</th><th>Cash Amount</th></tr>
      <tr><td>Jan 15, 2024</td><td>-$0.25</td></tr>
    </table>`;
    expect(() => adapter.parse(html, 'QQQI')).toThrow('negative amount -0.25 for 2024-01-15');
  });
});
