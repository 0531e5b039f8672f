import { describe, expect, it } from 'vitest';
import { dumpBin, dumpRequest, loadBin, loadRequest } from '../src/models';
import type { Bin } from '../src/models';

describe('bin records', () => {
  it('never stores requests inline', () => {
    const bin: Bin = {
      name: 'abcd1234',
      created: 1700000000,
      private: true,
      requests: [{ id: 'r1', time: 1700000001, payload: Buffer.from('x') }],
    };
    expect(dumpBin(bin)).toBe('{"name":"abcd1234","created":1700000000,"private":true}');
  });

  it('loads a valid record with an empty request list', () => {
    const decoded = loadBin('{"name":"abcd1234","created":1700000000,"private":false}');
    expect(decoded).toEqual({
      ok: true,
      value: { name: 'abcd1234', created: 1700000000, private: false, requests: [] },
    });
  });

  it('reports unparseable JSON as corrupt', () => {
    const decoded = loadBin('{not json');
    expect(decoded.ok).toBe(false);
  });

  it('reports a record with the wrong shape as corrupt', () => {
    const decoded = loadBin('{"name":"abcd1234","created":"yesterday","private":false}');
    expect(decoded.ok).toBe(false);
    if (!decoded.ok) expect(decoded.reason).toContain('created');
  });
});

describe('request records', () => {
  it('keeps binary payloads byte for byte', () => {
    const payload = Buffer.from([0, 255, 10, 13, 128]);
    const raw = dumpRequest({ id: 'q1w2e3', time: 1700000000.5, payload });
    expect(JSON.parse(raw)).toEqual({ id: 'q1w2e3', time: 1700000000.5, payload: 'AP8KDYA=' });

    const decoded = loadRequest(raw);
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.value.id).toBe('q1w2e3');
      expect(decoded.value.payload.equals(payload)).toBe(true);
    }
  });

  it('rejects records without an id', () => {
    expect(loadRequest('{"time":1,"payload":""}').ok).toBe(false);
  });
});
