import Fastify, { type FastifyError } from 'fastify';
import { BinStoreError } from './errors';
import { registerBinRoutes } from './routes/bins';
import { registerStatsRoutes } from './routes/stats';
import { redisBinStorage } from './storage/redisBinStorage';
import type { BinStorageBackend } from './contracts/binStorage';

export interface BuildAppOptions {
  storage?: BinStorageBackend;
  logger?: boolean | { level: string };
}

export async function buildApp(options: BuildAppOptions = {}) {
  const storage = options.storage ?? redisBinStorage;
  const app = Fastify({ logger: options.logger ?? false });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof BinStoreError) {
      return reply.code(err.status).send({ code: err.code, message: err.message });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ code: err.code ?? 'HTTP_ERROR', message: err.message });
    }
    req.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({ code: 'INTERNAL_ERROR', message: 'Unexpected internal server error' });
  });

  app.get('/health', async () => {
    const { ok } = await storage.health();
    return ok ? { status: 'ok', redis: 'ok' } : { status: 'degraded', redis: 'error' };
  });

  await registerBinRoutes(app, storage);
  await registerStatsRoutes(app, storage);
  return app;
}
