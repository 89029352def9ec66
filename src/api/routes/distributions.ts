import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { findFund } from '../../catalog/funds.js';
import { NotFoundError } from '../../errors.js';
import type { RouteDeps } from './types.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const listQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export const distributionsRoutes: FastifyPluginAsync<RouteDeps> = async (app, { loadHistory }) => {
  // GET /distributions — every fund, ex_date ascending
  app.get('/', async (request) => {
    const filter = listQuerySchema.parse(request.query);
    const store = await loadHistory();
    return store.query(filter);
  });

  // GET /distributions/:symbol — one fund; 404 outside the catalog, [] when nothing is stored yet
  app.get<{ Params: { symbol: string } }>('/:symbol', async (request) => {
    const fund = findFund(request.params.symbol);
    if (!fund) {
      throw new NotFoundError(`Unknown fund symbol: ${request.params.symbol}`);
    }

    const filter = listQuerySchema.parse(request.query);
    const store = await loadHistory();
    return store.query({ ...filter, fundSymbol: fund.symbol });
  });
};
