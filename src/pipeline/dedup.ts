import type { DistributionRecord } from '../types/distribution.js';

/** Uniqueness key of a distribution: fund + ex-dividend date. */
export function distributionKey(r: Pick<DistributionRecord, 'fund_symbol' | 'ex_date'>): string {
  return `${r.fund_symbol}|${r.ex_date}`;
}

/** Number of optional fields that are known. */
export function completeness(r: DistributionRecord): number {
  return r.pay_date === null ? 0 : 1;
}

export function sameDistribution(a: DistributionRecord, b: DistributionRecord): boolean {
  return (
    a.fund_symbol === b.fund_symbol &&
    a.ex_date === b.ex_date &&
    a.pay_date === b.pay_date &&
    a.amount === b.amount
  );
}

/**
 * Reconciles two records with the same key. The more complete one wins;
 * when both are equally complete the incoming (latest scraped) one wins.
 */
export function pickPreferred<T extends DistributionRecord>(existing: T, incoming: T): T {
  return completeness(incoming) < completeness(existing) ? existing : incoming;
}

/** Collapses records sharing a key, keeping first-seen order. */
export function dedupeDistributions<T extends DistributionRecord>(records: T[]): T[] {
  const byKey = new Map<string, T>();
  for (const record of records) {
    const key = distributionKey(record);
    const existing = byKey.get(key);
    byKey.set(key, existing ? pickPreferred(existing, record) : record);
  }
  return Array.from(byKey.values());
}
