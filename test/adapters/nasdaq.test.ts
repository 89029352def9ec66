import { describe, it, expect } from 'vitest';
import { NasdaqAdapter } from '../../src/adapters/nasdaq.js';
import { ParseError } from '../../src/errors.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('NasdaqAdapter', () => {
  const adapter = new NasdaqAdapter();

  it('should have correct config', () => {
    expect(adapter.config.id).toBe('nasdaq');
    expect(adapter.config.fetchMethod).toBe('http');
    expect(adapter.target('BTCI')).toEqual({
      url: 'https://api.nasdaq.com/api/quote/BTCI/dividends?assetclass=etf',
      accept: 'application/json, text/plain, */*',
    });
  });

  it('should parse dividend rows from the API response', () => {
    const records = adapter.parse(loadFixture('nasdaq', 'btci-dividends.json'), 'BTCI');

    expect(records).toEqual([
      { fund_symbol: 'BTCI', ex_date: '2024-01-22', pay_date: '2024-01-24', amount: 0.725 },
      { fund_symbol: 'BTCI', ex_date: '2023-12-20', pay_date: null, amount: 0.7 },
    ]);
  });

  it('should return empty array when rows is null', () => {
    const body = JSON.stringify({ data: { dividends: { rows: null } } });
    expect(adapter.parse(body, 'WPAY')).toEqual([]);
  });

  it('should throw ParseError for an unknown symbol response', () => {
    expect(() => adapter.parse(loadFixture('nasdaq', 'unknown-symbol.json'), 'BTCI')).toThrow(
      '[nasdaq:BTCI] response has no dividends section',
    );
  });

  it('should throw ParseError for non-JSON content', () => {
    expect(() => adapter.parse('<html>Access Denied</html>', 'BTCI')).toThrow(ParseError);
    expect(() => adapter.parse('<html>Access Denied</html>', 'BTCI')).toThrow('response is not JSON');
  });

  it('should throw ParseError when rows have the wrong shape', () => {
    const body = JSON.stringify({ data: { dividends: { rows: [{ exOrEffDate: 20240122 }] } } });
    expect(() => adapter.parse(body, 'BTCI')).toThrow(/unexpected response shape/);
  });
});
