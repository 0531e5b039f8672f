import RedisMock from 'ioredis-mock';
import type Redis from 'ioredis';
import { vi } from 'vitest';
import type { Logger } from '../src/logger';

/** In-process Redis; instances share data, so callers flush between tests. */
export function createRedis(): Redis {
  return new RedisMock();
}

export function createLogger() {
  return {
    warn: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } satisfies Logger;
}

/** Replaces `INFO` with a canned reply. */
export function stubInfo(redis: Redis, reply: string) {
  Object.assign(redis, { info: vi.fn(async () => reply) });
}
