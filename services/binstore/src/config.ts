import 'dotenv/config';

const DEFAULT_BIN_TTL_SECONDS = 60 * 60 * 48; // 48h

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: intFromEnv('PORT', 8080),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  redisDb: intFromEnv('REDIS_DB', 0),
  bins: {
    prefix: process.env.BIN_PREFIX || 'binstore',
    ttlSeconds: intFromEnv('BIN_TTL_SECONDS', DEFAULT_BIN_TTL_SECONDS),
    nameLength: intFromEnv('BIN_NAME_LENGTH', 8),
  },
  requests: {
    idLength: intFromEnv('REQUEST_ID_LENGTH', 6),
    maxIdAttempts: intFromEnv('REQUEST_ID_ATTEMPTS', 50),
    maxPayloadBytes: intFromEnv('MAX_PAYLOAD_BYTES', 1024 * 1024),
  },
};
