import { describe, expect, it, vi } from 'vitest';
import { IdAllocationExhaustedError } from '../src/errors';
import { buildApp } from '../src/server';
import type { BinStorageBackend } from '../src/contracts/binStorage';
import type { Bin } from '../src/models';

const bin: Bin = { name: 'abcd1234', created: 1700000000, private: false, requests: [] };

function fakeBackend(overrides: Partial<BinStorageBackend> = {}): BinStorageBackend {
  return {
    createBin: async () => bin,
    createRequest: async () => ({ id: 'r1', time: 1700000001, payload: Buffer.alloc(0) }),
    getBin: async () => bin,
    lookupBin: async () => bin,
    countBins: async () => 0,
    countRequests: async () => 0,
    avgRequestSize: async () => 0,
    health: async () => ({ ok: true }),
    ...overrides,
  };
}

describe('HTTP layer against the storage contract', () => {
  it('passes the captured body to createRequest', async () => {
    const createRequest = vi.fn<BinStorageBackend['createRequest']>(async () => ({
      id: 'r1',
      time: 1700000001,
      payload: Buffer.from('ping'),
    }));
    const lookupBin = vi.fn<BinStorageBackend['lookupBin']>(async () => bin);
    const app = await buildApp({ storage: fakeBackend({ createRequest, lookupBin }) });

    const res = await app.inject({
      method: 'POST',
      url: '/bins/abcd1234/requests',
      headers: { 'content-type': 'application/octet-stream' },
      payload: Buffer.from('ping'),
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ id: 'r1', time: 1700000001 });
    expect(createRequest).toHaveBeenCalledOnce();
    expect(createRequest.mock.calls[0]?.[0]).toBe(bin);
    expect(createRequest.mock.calls[0]?.[1].toString()).toBe('ping');
    expect(lookupBin).not.toHaveBeenCalled();
    await app.close();
  });

  it('surfaces id exhaustion as a 500 with its code', async () => {
    const app = await buildApp({
      storage: fakeBackend({
        createRequest: async () => {
          throw new IdAllocationExhaustedError(50);
        },
      }),
    });

    const res = await app.inject({
      method: 'POST',
      url: '/bins/abcd1234/requests',
      headers: { 'content-type': 'text/plain' },
      payload: 'x',
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({
      code: 'ID_ALLOCATION_EXHAUSTED',
      message: 'unique id allocation exhausted after 50 attempts',
    });
    await app.close();
  });

  it('hides backend failures behind INTERNAL_ERROR', async () => {
    const app = await buildApp({
      storage: fakeBackend({
        lookupBin: async () => {
          throw new Error('connect ECONNREFUSED');
        },
      }),
    });

    const res = await app.inject({ method: 'GET', url: '/bins/abcd1234' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ code: 'INTERNAL_ERROR', message: 'Unexpected internal server error' });
    await app.close();
  });

  it('reports degraded health', async () => {
    const app = await buildApp({ storage: fakeBackend({ health: async () => ({ ok: false, details: 'down' }) }) });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toEqual({ status: 'degraded', redis: 'error' });
    await app.close();
  });
});
