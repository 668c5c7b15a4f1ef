import { Redis } from 'ioredis';
import type { PipelineConfig } from '../config.js';
import type { RawRecord } from '../types/record.js';
import { logger } from '../utils/logger.js';

/** Durable buffer between the API and the transform step. No transformation happens here. */
export interface RawDocumentStore {
  insertMany(records: readonly RawRecord[]): Promise<number>;
  findAll(): Promise<RawRecord[]>;
  deleteAll(): Promise<number>;
  /** Clear the buffer, then insert `records`. */
  replaceAll(records: readonly RawRecord[]): Promise<number>;
  close(): Promise<void>;
}

/** The slice of the ioredis client the store needs. */
export interface RedisListClient {
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  del(...keys: string[]): Promise<number>;
  quit(): Promise<string>;
}

export function createRedisClient(redis: PipelineConfig['redis']): Redis {
  if (redis.url) {
    return new Redis(redis.url, { maxRetriesPerRequest: 1, lazyConnect: true });
  }
  return new Redis({
    host: redis.host,
    port: redis.port,
    maxRetriesPerRequest: 1,
    lazyConnect: true,
  });
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Raw documents kept as JSON strings in a single Redis list. */
export class RedisRawStore implements RawDocumentStore {
  constructor(
    private readonly client: RedisListClient,
    private readonly key: string,
  ) {}

  async insertMany(records: readonly RawRecord[]): Promise<number> {
    if (records.length === 0) {
      logger.info({ key: this.key }, 'No raw documents to insert');
      return 0;
    }
    await this.client.rpush(this.key, ...records.map((r) => JSON.stringify(r)));
    logger.info({ key: this.key, count: records.length }, 'Raw documents buffered');
    return records.length;
  }

  async findAll(): Promise<RawRecord[]> {
    const entries = await this.client.lrange(this.key, 0, -1);
    const records: RawRecord[] = [];
    for (const [index, entry] of entries.entries()) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(entry);
      } catch (err) {
        logger.warn({ key: this.key, index, err }, 'Skipping unreadable raw document');
        continue;
      }
      if (isRecord(parsed)) {
        records.push(parsed);
      } else {
        logger.warn({ key: this.key, index }, 'Skipping raw document that is not an object');
      }
    }
    logger.info({ key: this.key, count: records.length }, 'Raw documents read');
    return records;
  }

  async deleteAll(): Promise<number> {
    const removed = await this.client.del(this.key);
    logger.warn({ key: this.key }, 'Raw document buffer cleared');
    return removed;
  }

  async replaceAll(records: readonly RawRecord[]): Promise<number> {
    await this.deleteAll();
    return this.insertMany(records);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
