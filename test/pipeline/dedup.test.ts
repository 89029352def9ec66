import { describe, it, expect } from 'vitest';
import {
  completeness,
  dedupeDistributions,
  distributionKey,
  pickPreferred,
} from '../../src/pipeline/dedup.js';
import type { DistributionRecord } from '../../src/types/index.js';

const base: DistributionRecord = {
  fund_symbol: 'QQQI',
  ex_date: '2024-01-15',
  pay_date: '2024-01-18',
  amount: 0.25,
};

describe('distributionKey', () => {
  it('should key on fund and ex-date only', () => {
    expect(distributionKey(base)).toBe('QQQI|2024-01-15');
    const revised: DistributionRecord = { ...base, amount: 0.3, pay_date: null };
    expect(distributionKey(revised)).toBe('QQQI|2024-01-15');
  });
});

describe('pickPreferred', () => {
  it('should keep the existing record when the incoming one is less complete', () => {
    const incoming = { ...base, pay_date: null, amount: 0.3 };
    expect(completeness(incoming)).toBe(0);
    expect(pickPreferred(base, incoming)).toBe(base);
  });

  it('should take the incoming record when it is more complete', () => {
    const existing = { ...base, pay_date: null };
    expect(pickPreferred(existing, base)).toBe(base);
  });

  it('should let the latest scrape win between equally complete records', () => {
    const corrected = { ...base, amount: 0.2675 };
    expect(pickPreferred(base, corrected)).toBe(corrected);
  });
});

describe('dedupeDistributions', () => {
  it('should collapse duplicates and keep first-seen order', () => {
    const records: DistributionRecord[] = [
      { ...base, ex_date: '2024-02-20' },
      { ...base, pay_date: null },
      base,
    ];

    expect(dedupeDistributions(records)).toEqual([{ ...base, ex_date: '2024-02-20' }, base]);
  });
});
