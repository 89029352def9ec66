import { describe, it, expect } from 'vitest';
import { findFund, getAllFunds, isFundSymbol } from '../../src/catalog/funds.js';

describe('fund catalog', () => {
  it('should list the tracked funds in order', () => {
    expect(getAllFunds().map((f) => f.symbol)).toEqual([
      'YBTC', 'BTCI', 'QQQI', 'IWMI', 'IAUI', 'KQQQ', 'MSTW', 'WPAY',
    ]);
  });

  it('should pay YBTC and MSTW weekly and the rest monthly', () => {
    const weekly = getAllFunds().filter((f) => f.frequency === 'weekly').map((f) => f.symbol);
    expect(weekly).toEqual(['YBTC', 'MSTW']);
    expect(findFund('WPAY')).toMatchObject({ frequency: 'monthly', declareDay: 'Monthly' });
  });

  it('should look symbols up case-insensitively', () => {
    expect(findFund('qqqi')?.symbol).toBe('QQQI');
    expect(findFund('SPY')).toBeNull();
    expect(isFundSymbol('SPY')).toBe(false);
  });
});
