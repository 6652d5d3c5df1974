/**
 * Redis-backed key-value store
 *
 * Keys are namespaced with a service prefix and never expire; expiry policy
 * belongs to the callers (they persist their own timestamps).
 *
 * @example
 * const store = new RedisKeyValueStore({
 *   serviceName: 'catalog-service',
 *   keyPrefix: 'robin-radio:catalog:',
 *   url: process.env.REDIS_URL,
 * });
 */

import Redis from 'ioredis';
import { getLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { toError } from '../error-handling/errors';
import { KeyValueStoreError, type IKeyValueStore, type KeyValueOperation } from './types';

export interface RedisKeyValueStoreConfig {
  serviceName: string;
  keyPrefix: string;
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  db?: number;
  maxRetriesPerRequest?: number;
}

const SCAN_COUNT = 200;

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

export class RedisKeyValueStore implements IKeyValueStore {
  private readonly client: Redis;
  private readonly keyPrefix: string;
  private readonly logger;

  constructor(config: RedisKeyValueStoreConfig) {
    this.keyPrefix = config.keyPrefix;
    this.logger = getLogger(`${config.serviceName}-redis`);

    const sharedOpts = {
      maxRetriesPerRequest: config.maxRetriesPerRequest ?? 3,
      enableReadyCheck: true,
      lazyConnect: true,
    };
    this.client = config.url
      ? new Redis(config.url, sharedOpts)
      : new Redis({
          host: config.host || 'localhost',
          port: config.port ?? 6379,
          password: config.password,
          db: config.db ?? 0,
          ...sharedOpts,
        });

    this.client.on('connect', () => {
      this.logger.info('Connected to Redis', { keyPrefix: this.keyPrefix });
    });
    this.client.on('error', (err: Error) => {
      this.logger.error('Redis connection error', { error: err.message });
    });
  }

  async get(key: string): Promise<string | null> {
    return this.run('get', key, () => this.client.get(this.prefixKey(key)));
  }

  async set(key: string, value: string): Promise<void> {
    await this.run('set', key, () => this.client.set(this.prefixKey(key), value));
  }

  async remove(key: string): Promise<void> {
    await this.run('remove', key, () => this.client.del(this.prefixKey(key)));
  }

  async has(key: string): Promise<boolean> {
    const count = await this.run('has', key, () => this.client.exists(this.prefixKey(key)));
    return count === 1;
  }

  async keys(prefix: string): Promise<string[]> {
    return this.run('keys', prefix, async () => {
      const pattern = `${escapeGlob(this.prefixKey(prefix))}*`;
      const found = new Set<string>();
      let cursor = '0';
      do {
        const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
        for (const key of batch) found.add(key.slice(this.keyPrefix.length));
        cursor = next;
      } while (cursor !== '0');
      return [...found];
    });
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn('Redis quit failed, disconnecting', { error: serializeError(error) });
      this.client.disconnect();
    }
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async run<T>(operation: KeyValueOperation, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error(`Redis ${operation} failed`, { key, error: serializeError(error) });
      throw new KeyValueStoreError('redis', operation, toError(error), key);
    }
  }
}
