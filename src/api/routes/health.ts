import type { FastifyPluginAsync } from 'fastify';
import type { RouteDeps } from './types.js';

export const healthRoutes: FastifyPluginAsync<RouteDeps> = async (app, { loadHistory }) => {
  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
  }));

  // Freshness of the history file, as written by the last batch run
  app.get('/status', async () => {
    const store = await loadHistory();
    return {
      status: store.size > 0 ? 'ok' : 'no_data',
      last_updated: store.updatedAt,
      last_run: store.lastRunSummary,
      records: store.size,
      funds: store.funds(),
    };
  });
};
