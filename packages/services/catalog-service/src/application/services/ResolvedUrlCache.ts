/**
 * Resolved-URL Cache
 *
 * Maps blob paths to signed download URLs. The whole table shares one timestamp:
 * once it is older than the TTL every entry is dropped at once, in memory and on load.
 */

import { z } from 'zod';
import {
  getLogger,
  serializeError,
  withRetry,
  withTimeout,
  type IKeyValueStore,
  type RetryOptions,
} from '@robin-radio/platform-core';
import type { IRemoteCatalogStore } from '../interfaces/IRemoteCatalogStore';

const logger = getLogger('catalog-service-url-cache');

export const URL_CACHE_KEY = 'robin_radio_url_cache';
export const URL_CACHE_TIME_KEY = 'robin_radio_url_cache_time';
export const URL_CACHE_TTL_MS = 60 * 60 * 1000;
export const URL_RESOLVE_TIMEOUT_MS = 5000;

const PersistedUrlTableSchema = z.record(z.string());

export interface ResolvedUrlCacheOptions {
  ttlMs?: number;
  resolveTimeoutMs?: number;
  retry?: RetryOptions;
}

export class ResolvedUrlCache {
  private entries = new Map<string, string>();
  private cacheTime: number | null = null;
  private readonly ttlMs: number;
  private readonly resolveTimeoutMs: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly remoteStore: IRemoteCatalogStore,
    private readonly kvStore: IKeyValueStore,
    options: ResolvedUrlCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? URL_CACHE_TTL_MS;
    this.resolveTimeoutMs = options.resolveTimeoutMs ?? URL_RESOLVE_TIMEOUT_MS;
    this.retry = options.retry ?? {};
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Hydrates the table from the persisted copy when that copy is younger than the TTL.
   * Unreadable or stale persisted data leaves the table empty.
   */
  async load(): Promise<void> {
    try {
      const [rawTable, rawTime] = await Promise.all([this.kvStore.get(URL_CACHE_KEY), this.kvStore.get(URL_CACHE_TIME_KEY)]);
      if (rawTable === null || rawTime === null) return;

      const savedAt = Date.parse(rawTime);
      if (Number.isNaN(savedAt) || Date.now() - savedAt >= this.ttlMs) {
        logger.debug('Persisted URL cache expired, discarding', { savedAt: rawTime });
        return;
      }

      const table = PersistedUrlTableSchema.parse(JSON.parse(rawTable));
      this.entries = new Map(Object.entries(table));
      this.cacheTime = savedAt;
      logger.debug('URL cache loaded', { entries: this.entries.size });
    } catch (error) {
      logger.warn('Failed to load persisted URL cache, starting empty', { error: serializeError(error) });
      this.entries.clear();
      this.cacheTime = null;
    }
  }

  async resolve(path: string): Promise<string> {
    if (this.isExpired()) {
      logger.debug('URL cache expired, clearing table', { entries: this.entries.size });
      this.clear();
    }

    const cached = this.entries.get(path);
    if (cached !== undefined) return cached;

    const url = await withRetry(
      () => withTimeout(() => this.remoteStore.getDownloadUrl(path), this.resolveTimeoutMs, `resolve URL ${path}`),
      { ...this.retry, label: 'getDownloadUrl' }
    );

    if (this.entries.size === 0) this.cacheTime = Date.now();
    this.entries.set(path, url);
    return url;
  }

  /**
   * Persists the table with the current time. Skipped when the table is empty.
   * Failures are logged; the in-memory table stays authoritative.
   */
  async save(): Promise<void> {
    if (this.entries.size === 0) return;
    try {
      await this.kvStore.set(URL_CACHE_KEY, JSON.stringify(Object.fromEntries(this.entries)));
      await this.kvStore.set(URL_CACHE_TIME_KEY, new Date().toISOString());
    } catch (error) {
      logger.warn('Failed to persist URL cache', { entries: this.entries.size, error: serializeError(error) });
    }
  }

  clear(): void {
    this.entries.clear();
    this.cacheTime = null;
  }

  private isExpired(): boolean {
    return this.cacheTime !== null && Date.now() - this.cacheTime >= this.ttlMs;
  }
}
