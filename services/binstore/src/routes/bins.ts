import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { config } from '../config';
import type { BinStorageBackend } from '../contracts/binStorage';
import type { Bin, CapturedRequest } from '../models';

// ---------- Schemas ----------
const createBinQuerySchema = z.object({
  private: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
});

const binParamsSchema = z.object({
  name: z.string().regex(/^[a-z0-9]+$/, 'invalid bin name'),
});

// ---------- Helpers ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: error.flatten() });
}

function toRequestJson(request: CapturedRequest) {
  return { id: request.id, time: request.time, payload: request.payload.toString('base64') };
}

function toBinJson(bin: Bin) {
  return {
    name: bin.name,
    created: bin.created,
    private: bin.private,
    requests: bin.requests.map(toRequestJson),
  };
}

// ---------- Routes ----------
export async function registerBinRoutes(app: FastifyInstance, storage: BinStorageBackend) {
  // Create
  app.post('/bins', async (req, reply) => {
    const parsed = createBinQuerySchema.safeParse(req.query);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const bin = await storage.createBin(parsed.data.private ?? false);
    return reply.send({ name: bin.name, created: bin.created, private: bin.private });
  });

  // Read (requests newest first)
  app.get('/bins/:name', async (req, reply) => {
    const parsed = binParamsSchema.safeParse(req.params);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const bin = await storage.lookupBin(parsed.data.name);
    return reply.send(toBinJson(bin));
  });

  // Capture: any content type, body kept as raw bytes
  await app.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser(
      '*',
      { parseAs: 'buffer', bodyLimit: config.requests.maxPayloadBytes },
      (_req, body, done) => done(null, body),
    );

    scope.post('/bins/:name/requests', async (req, reply) => {
      const parsed = binParamsSchema.safeParse(req.params);
      if (!parsed.success) return badRequest(reply, parsed.error);

      const bin = await storage.getBin(parsed.data.name);
      const payload = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const request = await storage.createRequest(bin, payload);
      req.log.debug({ bin: bin.name, request: request.id, bytes: payload.length }, 'Captured request');
      return reply.send({ id: request.id, time: request.time });
    });
  });
}
