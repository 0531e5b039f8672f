import type { FastifyInstance } from 'fastify';
import type { BinStorageBackend } from '../contracts/binStorage';

export async function registerStatsRoutes(app: FastifyInstance, storage: BinStorageBackend) {
  app.get('/stats', async (_req, reply) => {
    const [bins, requests, avgSize] = await Promise.all([
      storage.countBins(),
      storage.countRequests(),
      storage.avgRequestSize(),
    ]);
    return reply.send({ bins, requests, avg_request_size_kb: avgSize });
  });
}
