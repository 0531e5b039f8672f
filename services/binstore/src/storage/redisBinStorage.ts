import type Redis from 'ioredis';
import { config } from '../config';
import { IdAllocationExhaustedError, NotFoundError, ValidationError } from '../errors';
import { tinyId, type IdGenerator } from '../ids';
import { logger as defaultLogger, type Logger } from '../logger';
import { dumpBin, dumpRequest, loadBin, loadRequest, type Bin, type BinName, type CapturedRequest } from '../models';
import { getRedis } from '../redis/client';
import { parseInfo } from '../redis/info';
import {
  EXPIRY_OFFSET,
  binDetailsKey,
  binDetailsPattern,
  requestCountKey,
  requestKey,
  requestListKey,
} from '../redis/keys';
import type { BinStorageBackend } from '../contracts/binStorage';

export interface RedisBinStorageOptions {
  redis?: Redis;
  /** Database index whose keyspace stats feed `avgRequestSize`. */
  redisDb?: number;
  prefix?: string;
  ttlSeconds?: number;
  binNameLength?: number;
  requestIdLength?: number;
  maxIdAttempts?: number;
  generateId?: IdGenerator;
  /** Clock in milliseconds. */
  now?: () => number;
  logger?: Logger;
}

/**
 * Implements `BinStorageBackend` on Redis.
 *
 * A bin is spread over three independently expiring keys (details, request index,
 * one key per request). Their expiry times are staggered by one second each, so
 * whenever the index is still readable every id in it still resolves, and whenever
 * the details are readable the index is too. Reads are four plain commands and are
 * not atomic with respect to concurrent appends.
 */
export class RedisBinStorage implements BinStorageBackend {
  private readonly prefix: string;
  private readonly ttlSeconds: number;
  private readonly binNameLength: number;
  private readonly requestIdLength: number;
  private readonly maxIdAttempts: number;
  private readonly redisDb: number;
  private readonly generateId: IdGenerator;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: RedisBinStorageOptions = {}) {
    this.prefix = options.prefix ?? config.bins.prefix;
    this.ttlSeconds = options.ttlSeconds ?? config.bins.ttlSeconds;
    this.binNameLength = options.binNameLength ?? config.bins.nameLength;
    this.requestIdLength = options.requestIdLength ?? config.requests.idLength;
    this.maxIdAttempts = options.maxIdAttempts ?? config.requests.maxIdAttempts;
    this.redisDb = options.redisDb ?? config.redisDb;
    this.generateId = options.generateId ?? tinyId;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? defaultLogger;
  }

  private get redis(): Redis {
    return this.options.redis ?? getRedis();
  }

  async createBin(isPrivate = false, ttlSeconds = this.ttlSeconds): Promise<Bin> {
    assertTtl(ttlSeconds);
    const bin: Bin = {
      name: this.generateId(this.binNameLength),
      created: Math.floor(this.now() / 1000),
      private: isPrivate,
      requests: [],
    };

    const key = binDetailsKey(this.prefix, bin.name);
    await this.redis.set(key, dumpBin(bin));
    await this.redis.expireat(key, bin.created + ttlSeconds + EXPIRY_OFFSET.details);
    return bin;
  }

  async createRequest(bin: Bin, payload: Buffer, ttlSeconds = this.ttlSeconds): Promise<CapturedRequest> {
    assertTtl(ttlSeconds);
    const redis = this.redis;
    const time = this.now() / 1000;

    // SET NX doubles as collision detection: of two writers racing on one id, only one wins.
    let request: CapturedRequest | null = null;
    let key = '';
    for (let attempt = 0; attempt < this.maxIdAttempts; attempt++) {
      const candidate: CapturedRequest = { id: this.generateId(this.requestIdLength), time, payload };
      key = requestKey(this.prefix, bin.name, candidate.id);
      const written = await redis.set(key, dumpRequest(candidate), 'NX');
      if (written === 'OK') {
        request = candidate;
        break;
      }
    }
    if (!request) {
      throw new IdAllocationExhaustedError(this.maxIdAttempts);
    }
    await redis.expireat(key, bin.created + ttlSeconds + EXPIRY_OFFSET.request);

    const listKey = requestListKey(this.prefix, bin.name);
    await redis.rpush(listKey, request.id);
    // recomputed on every append
    await redis.expireat(listKey, bin.created + ttlSeconds + EXPIRY_OFFSET.requestList);

    const countKey = requestCountKey(this.prefix);
    await redis.setnx(countKey, 0);
    await redis.incr(countKey);

    return request;
  }

  async getBin(name: BinName): Promise<Bin> {
    const redis = this.redis;
    const detailsKey = binDetailsKey(this.prefix, name);

    const raw = await redis.get(detailsKey);
    if (raw === null) {
      throw new NotFoundError();
    }

    const decoded = loadBin(raw);
    if (!decoded.ok) {
      this.log.warn({ bin: name, reason: decoded.reason }, 'Corrupt bin details, deleting');
      try {
        await redis.del(detailsKey);
      } catch (err) {
        this.log.warn({ bin: name, err }, 'Failed to delete corrupt bin details');
      }
      throw new NotFoundError();
    }
    return decoded.value;
  }

  async lookupBin(name: BinName): Promise<Bin> {
    const redis = this.redis;
    const bin = await this.getBin(name);

    const listKey = requestListKey(this.prefix, name);
    const count = await redis.llen(listKey);
    if (count === 0) return bin;

    const ids = await redis.lrange(listKey, 0, count - 1);
    if (ids.length === 0) return bin;
    const records = await redis.mget(...ids.map((id) => requestKey(this.prefix, name, id)));

    const requests: CapturedRequest[] = [];
    records.forEach((record, idx) => {
      // expired between LRANGE and MGET
      if (record === null) return;
      const req = loadRequest(record);
      if (!req.ok) {
        this.log.warn({ bin: name, request: ids[idx], reason: req.reason }, 'Skipping corrupt request record');
        return;
      }
      requests.push(req.value);
    });

    bin.requests = requests.reverse();
    return bin;
  }

  async countBins(): Promise<number> {
    const keys = await this.redis.keys(binDetailsPattern(this.prefix));
    return keys.length;
  }

  async countRequests(): Promise<number> {
    const raw = await this.redis.get(requestCountKey(this.prefix));
    if (!raw) return 0;
    const count = parseInt(raw, 10);
    return Number.isFinite(count) ? count : 0;
  }

  async avgRequestSize(): Promise<number> {
    const info = parseInfo(await this.redis.info());
    const keys = info.keyspace[`db${this.redisDb}`]?.keys ?? 0;
    if (keys === 0) return 0;
    return info.usedMemory / keys / 1024;
  }

  async health(): Promise<{ ok: boolean; details?: string }> {
    try {
      const pong = await this.redis.ping();
      return { ok: pong === 'PONG', details: pong };
    } catch (err) {
      return { ok: false, details: err instanceof Error ? err.message : String(err) };
    }
  }
}

function assertTtl(ttlSeconds: number) {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new ValidationError('ttl must be a positive integer number of seconds');
  }
}

export const redisBinStorage = new RedisBinStorage();
