import Redis from 'ioredis';
import { config } from '../config';

let client: Redis | null = null;

/** Shared connection used when `RedisBinStorage` is not handed its own client. */
export function getRedis(): Redis {
  if (!client) {
    client = new Redis(config.redisUrl, {
      db: config.redisDb,
      lazyConnect: false,
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
    });
  }
  return client;
}

// called on shutdown; a later getRedis() opens a fresh connection
export async function closeRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
