import path from 'node:path';
import { fileURLToPath } from 'node:url';
import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import fastifyStatic from '@fastify/static';
import { ZodError } from 'zod';
import { config } from '../config.js';
import { NotFoundError, StoreError } from '../errors.js';
import { HistoryStore } from '../store/history-store.js';
import { distributionsRoutes } from './routes/distributions.js';
import { fundsRoutes } from './routes/funds.js';
import { healthRoutes } from './routes/health.js';
import type { RouteDeps } from './routes/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface ServerOptions {
  historyFile: string;
  /** false disables request logging (tests). */
  logger?: boolean;
  publicDir?: string;
}

function zodMessage(err: ZodError): string {
  return err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

export async function createServer(options: ServerOptions) {
  const app = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: config.LOG_LEVEL,
            ...(config.NODE_ENV === 'development'
              ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
              : {}),
          },
  });

  // The page may be opened from file:// or another origin
  app.addHook('onSend', async (_req: FastifyRequest, reply: FastifyReply) => {
    void reply.header('Access-Control-Allow-Origin', '*');
    void reply.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
    void reply.header('Access-Control-Allow-Headers', 'Content-Type');
  });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof NotFoundError) {
      return reply.status(404).send({ error: err.code, message: err.message });
    }
    if (err instanceof ZodError) {
      return reply.status(400).send({ error: 'bad_request', message: zodMessage(err) });
    }
    if (err instanceof StoreError) {
      request.log.error({ err }, 'History read failed');
      return reply
        .status(500)
        .send({ error: err.code, message: 'Could not read distribution history' });
    }
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: 'bad_request', message: err.message });
    }
    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'internal_error', message: 'Internal server error' });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send({ error: 'not_found', message: `Route ${request.method} ${request.url} not found` });
  });

  const deps: RouteDeps = { loadHistory: () => HistoryStore.open(options.historyFile) };

  // Serve the presentation page from public/
  await app.register(fastifyStatic, {
    root: options.publicDir ?? path.join(__dirname, '..', '..', 'public'),
    prefix: '/',
  });

  await app.register(healthRoutes, deps);
  await app.register(distributionsRoutes, { ...deps, prefix: '/distributions' });
  await app.register(fundsRoutes, { ...deps, prefix: '/funds' });

  return app;
}
