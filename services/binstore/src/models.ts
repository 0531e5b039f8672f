import { z } from 'zod';

export type BinName = string;
export type RequestId = string;

export interface CapturedRequest {
  id: RequestId;
  time: number;     // unix seconds
  payload: Buffer;  // opaque, stored verbatim
}

export interface Bin {
  name: BinName;
  created: number;  // unix seconds, fixes the expiry schedule of everything under the bin
  private: boolean;
  requests: CapturedRequest[];  // only populated on read
}

// ---------- Persisted shapes ----------
const binRecordSchema = z.object({
  name: z.string().min(1),
  created: z.number().int().nonnegative(),
  private: z.boolean(),
});

const requestRecordSchema = z.object({
  id: z.string().min(1),
  time: z.number().nonnegative(),
  payload: z.string(),
});

export type Decoded<T> = { ok: true; value: T } | { ok: false; reason: string };

function parseRecord<S extends z.ZodTypeAny>(schema: S, raw: string): Decoded<z.infer<S>> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ') };
  }
  return { ok: true, value: parsed.data };
}

/** Requests are never stored inline with the bin. */
export function dumpBin(bin: Bin): string {
  return JSON.stringify({ name: bin.name, created: bin.created, private: bin.private });
}

export function loadBin(raw: string): Decoded<Bin> {
  const decoded = parseRecord(binRecordSchema, raw);
  if (!decoded.ok) return decoded;
  return { ok: true, value: { ...decoded.value, requests: [] } };
}

export function dumpRequest(request: CapturedRequest): string {
  return JSON.stringify({
    id: request.id,
    time: request.time,
    payload: request.payload.toString('base64'),
  });
}

export function loadRequest(raw: string): Decoded<CapturedRequest> {
  const decoded = parseRecord(requestRecordSchema, raw);
  if (!decoded.ok) return decoded;
  const { id, time, payload } = decoded.value;
  return { ok: true, value: { id, time, payload: Buffer.from(payload, 'base64') } };
}
