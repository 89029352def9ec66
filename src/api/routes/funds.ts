import type { FastifyPluginAsync } from 'fastify';
import { findFund, getAllFunds } from '../../catalog/funds.js';
import { NotFoundError } from '../../errors.js';
import { computeStatistics } from '../../pipeline/statistics.js';
import type { RouteDeps } from './types.js';

export const fundsRoutes: FastifyPluginAsync<RouteDeps> = async (app, { loadHistory }) => {
  app.get('/', async () => {
    const store = await loadHistory();
    return getAllFunds().map((fund) => {
      const records = store.query({ fundSymbol: fund.symbol });
      return {
        symbol: fund.symbol,
        name: fund.name,
        frequency: fund.frequency,
        declare_day: fund.declareDay,
        record_count: records.length,
        latest: records.at(-1) ?? null,
      };
    });
  });

  app.get<{ Params: { symbol: string } }>('/:symbol/statistics', async (request) => {
    const fund = findFund(request.params.symbol);
    if (!fund) {
      throw new NotFoundError(`Unknown fund symbol: ${request.params.symbol}`);
    }

    const store = await loadHistory();
    return {
      symbol: fund.symbol,
      statistics: computeStatistics(store.query({ fundSymbol: fund.symbol })),
    };
  });
};
