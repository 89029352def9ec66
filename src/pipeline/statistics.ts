import type { DistributionRecord } from '../types/distribution.js';

export type Trend = 'increasing' | 'decreasing' | 'stable';

export interface DistributionStatistics {
  count: number;
  latest: number;
  average: number;
  min: number;
  max: number;
  /** Sum of the 12 most recent distributions */
  total_12: number;
  trend: Trend;
}

const TREND_WINDOW = 3;
const TREND_THRESHOLD_PCT = 5;

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Compares the last 3 payouts with the 3 before them. */
export function computeTrend(newestFirst: number[]): Trend {
  const recent = newestFirst.slice(0, TREND_WINDOW);
  const older = newestFirst.slice(TREND_WINDOW, TREND_WINDOW * 2);
  if (recent.length < 2 || older.length === 0) return 'stable';

  const olderAvg = mean(older);
  if (olderAvg <= 0) return 'stable';

  const diffPct = ((mean(recent) - olderAvg) / olderAvg) * 100;
  if (diffPct > TREND_THRESHOLD_PCT) return 'increasing';
  if (diffPct < -TREND_THRESHOLD_PCT) return 'decreasing';
  return 'stable';
}

/** Null when the fund has no positive distributions. */
export function computeStatistics(records: DistributionRecord[]): DistributionStatistics | null {
  const amounts = [...records]
    .sort((a, b) => (a.ex_date < b.ex_date ? 1 : a.ex_date > b.ex_date ? -1 : 0))
    .map((r) => r.amount)
    .filter((a) => a > 0);

  const [latest] = amounts;
  if (latest === undefined) return null;

  return {
    count: amounts.length,
    latest,
    average: mean(amounts),
    min: Math.min(...amounts),
    max: Math.max(...amounts),
    total_12: amounts.slice(0, 12).reduce((sum, v) => sum + v, 0),
    trend: computeTrend(amounts),
  };
}
