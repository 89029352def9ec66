import { FUND_SYMBOLS, type FundCatalogEntry, type FundSymbol } from '../types/fund.js';

const entries: FundCatalogEntry[] = [
  {
    symbol: 'YBTC',
    name: 'Roundhill Bitcoin Covered Call Strategy ETF',
    frequency: 'weekly',
    declareDay: 'Tuesday',
    sources: ['stockanalysis', 'nasdaq'],
  },
  {
    symbol: 'BTCI',
    name: 'Neos Bitcoin Covered Call ETF',
    frequency: 'monthly',
    declareDay: '3rd Tuesday',
    sources: ['stockanalysis', 'nasdaq'],
  },
  {
    symbol: 'QQQI',
    name: 'Neos Nasdaq 100 High Income ETF',
    frequency: 'monthly',
    declareDay: '3rd Tuesday',
    sources: ['stockanalysis', 'nasdaq'],
  },
  {
    symbol: 'IWMI',
    name: 'Neos Russell 2000 High Income ETF',
    frequency: 'monthly',
    declareDay: '3rd Tuesday',
    sources: ['stockanalysis', 'nasdaq'],
  },
  {
    symbol: 'IAUI',
    name: 'Innovator Gold-U.S. Equity Income ETF',
    frequency: 'monthly',
    declareDay: 'Monthly',
    sources: ['stockanalysis', 'nasdaq-web'],
  },
  {
    symbol: 'KQQQ',
    name: 'Kurv Yield Premium Strategy Nasdaq 100 ETF',
    frequency: 'monthly',
    declareDay: 'Monthly',
    sources: ['stockanalysis', 'nasdaq-web'],
  },
  {
    symbol: 'MSTW',
    name: 'Roundhill MicroStrategy Covered Call ETF',
    frequency: 'weekly',
    declareDay: 'Weekly',
    sources: ['stockanalysis', 'nasdaq-web'],
  },
  {
    symbol: 'WPAY',
    name: 'YieldMax Tickers PayPal Option Income ETF',
    frequency: 'monthly',
    declareDay: 'Monthly',
    sources: ['stockanalysis', 'nasdaq-web'],
  },
];

export const FUND_CATALOG: ReadonlyMap<FundSymbol, Readonly<FundCatalogEntry>> = new Map(
  entries.map((entry) => [entry.symbol, Object.freeze({ ...entry, sources: Object.freeze([...entry.sources]) })]),
);

export function isFundSymbol(value: string): value is FundSymbol {
  return FUND_SYMBOLS.some((symbol) => symbol === value);
}

/** Case-insensitive lookup; null for symbols outside the catalog. */
export function findFund(symbol: string): Readonly<FundCatalogEntry> | null {
  const upper = symbol.trim().toUpperCase();
  return isFundSymbol(upper) ? (FUND_CATALOG.get(upper) ?? null) : null;
}

export function getAllFunds(): Readonly<FundCatalogEntry>[] {
  return Array.from(FUND_CATALOG.values());
}
