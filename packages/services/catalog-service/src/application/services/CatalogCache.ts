/**
 * Catalog Cache
 *
 * Two tiers holding the album list: process memory and the persisted key-value store.
 * Each tier carries its own timestamp and is checked against the TTL independently.
 * Persisting is best-effort; read failures count as a miss.
 */

import { z } from 'zod';
import { getLogger, serializeError, toError, type IKeyValueStore } from '@robin-radio/platform-core';
import { Album, AlbumSnapshotSchema } from '../../domains/catalog/entities/Album';
import { CatalogError } from '../errors';

const logger = getLogger('catalog-service-catalog-cache');

export const CATALOG_CACHE_KEY = 'robin_radio_music_cache';
export const CATALOG_CACHE_TIME_KEY = 'robin_radio_music_cache_time';
export const CATALOG_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

const PersistedCatalogSchema = z.array(AlbumSnapshotSchema);

interface MemorySnapshot {
  albums: Album[];
  cachedAt: number;
}

export interface CatalogCacheOptions {
  ttlMs?: number;
}

export class CatalogCache {
  private memory: MemorySnapshot | null = null;
  private readonly ttlMs: number;

  constructor(
    private readonly kvStore: IKeyValueStore,
    options: CatalogCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? CATALOG_CACHE_TTL_MS;
  }

  /**
   * Fresh in-memory albums, or null.
   */
  readMemory(): Album[] | null {
    if (!this.memory) return null;
    if (Date.now() - this.memory.cachedAt >= this.ttlMs) {
      logger.debug('Memory catalog expired');
      return null;
    }
    return this.memory.albums;
  }

  /**
   * Fresh persisted albums, or null. A hit also hydrates memory with the persisted timestamp.
   * Throws CatalogError (cache category) on unreadable or corrupted data; use readPersistedOrMiss
   * where a failure should simply fall through.
   */
  async readPersisted(): Promise<Album[] | null> {
    let rawAlbums: string | null;
    let rawTime: string | null;
    try {
      [rawAlbums, rawTime] = await Promise.all([
        this.kvStore.get(CATALOG_CACHE_KEY),
        this.kvStore.get(CATALOG_CACHE_TIME_KEY),
      ]);
    } catch (error) {
      throw CatalogError.cacheReadFailed(CATALOG_CACHE_KEY, toError(error));
    }
    if (rawAlbums === null || rawTime === null) return null;

    const cachedAt = Date.parse(rawTime);
    if (Number.isNaN(cachedAt)) {
      throw CatalogError.cacheCorrupted(CATALOG_CACHE_TIME_KEY);
    }
    if (Date.now() - cachedAt >= this.ttlMs) {
      logger.debug('Persisted catalog expired', { cachedAt: rawTime });
      return null;
    }

    let albums: Album[];
    try {
      albums = PersistedCatalogSchema.parse(JSON.parse(rawAlbums)).map(snapshot => Album.fromSnapshot(snapshot));
    } catch (error) {
      throw CatalogError.cacheCorrupted(CATALOG_CACHE_KEY, toError(error));
    }

    this.memory = { albums, cachedAt };
    return albums;
  }

  async readPersistedOrMiss(): Promise<Album[] | null> {
    try {
      return await this.readPersisted();
    } catch (error) {
      logger.warn('Persisted catalog unreadable, treating as cache miss', { error: serializeError(error) });
      return null;
    }
  }

  /**
   * Replaces the memory snapshot and writes it through. Persistence failures are logged only.
   */
  async write(albums: Album[]): Promise<void> {
    const cachedAt = Date.now();
    this.memory = { albums, cachedAt };
    await this.persist(albums, cachedAt);
  }

  /**
   * Splices one album into the cached list, replacing the entry with the same id or appending it.
   * Other albums and the snapshot timestamp are left untouched.
   */
  async replaceAlbum(album: Album): Promise<Album[]> {
    const current = this.readMemory() ?? (await this.readPersistedOrMiss()) ?? [];
    const index = current.findIndex(existing => existing.id === album.id);
    const albums = index >= 0 ? current.map((existing, i) => (i === index ? album : existing)) : [...current, album];

    const cachedAt = this.memory?.cachedAt ?? Date.now();
    this.memory = { albums, cachedAt };
    await this.persist(albums, cachedAt);
    return albums;
  }

  invalidate(): void {
    this.memory = null;
  }

  /**
   * Drops both tiers. A failure to remove the persisted entries surfaces as CACHE_WRITE_FAILED.
   */
  async clear(): Promise<void> {
    this.memory = null;
    try {
      await this.kvStore.remove(CATALOG_CACHE_KEY);
      await this.kvStore.remove(CATALOG_CACHE_TIME_KEY);
    } catch (error) {
      throw CatalogError.cacheWriteFailed(CATALOG_CACHE_KEY, toError(error));
    }
    logger.info('Catalog cache cleared');
  }

  private async persist(albums: Album[], cachedAt: number): Promise<void> {
    try {
      await this.kvStore.set(CATALOG_CACHE_KEY, JSON.stringify(albums));
      await this.kvStore.set(CATALOG_CACHE_TIME_KEY, new Date(cachedAt).toISOString());
    } catch (error) {
      logger.warn('Failed to persist catalog cache', { albums: albums.length, error: serializeError(error) });
    }
  }
}
