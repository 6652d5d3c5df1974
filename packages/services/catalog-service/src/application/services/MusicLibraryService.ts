/**
 * Music Library Service
 *
 * Catalog-side produced interface. Reads go memory → persisted → remote sync,
 * with write-through on a successful sync.
 */

import { TimeoutError, getLogger, serializeError, withTimeout } from '@robin-radio/platform-core';
import type { Album } from '../../domains/catalog/entities/Album';
import type { Song } from '../../domains/catalog/entities/Song';
import { CatalogError } from '../errors';
import type { CatalogCache } from './CatalogCache';
import type { CatalogSynchronizer } from './CatalogSynchronizer';
import type { ProgressEventStream, ProgressListener } from './ProgressEventStream';
import type { ResolvedUrlCache } from './ResolvedUrlCache';

const logger = getLogger('catalog-service-music-library');

export const DEFAULT_LOAD_BUDGET_MS = 30000;

export interface MusicLibraryServiceOptions {
  loadBudgetMs?: number;
}

export class MusicLibraryService {
  private readonly loadBudgetMs: number;
  private inFlightSync: Promise<Album[]> | null = null;
  private urlCacheLoaded: Promise<void> | null = null;

  constructor(
    private readonly catalogCache: CatalogCache,
    private readonly urlCache: ResolvedUrlCache,
    private readonly synchronizer: CatalogSynchronizer,
    private readonly progress: ProgressEventStream,
    options: MusicLibraryServiceOptions = {}
  ) {
    this.loadBudgetMs = options.loadBudgetMs ?? DEFAULT_LOAD_BUDGET_MS;
  }

  async getCatalog(): Promise<Album[]> {
    const inMemory = this.catalogCache.readMemory();
    if (inMemory) {
      logger.debug('Serving catalog from memory', { albums: inMemory.length });
      return inMemory;
    }

    const persisted = await this.catalogCache.readPersistedOrMiss();
    if (persisted) {
      logger.debug('Serving catalog from persisted cache', { albums: persisted.length });
      return persisted;
    }

    return this.syncAndStore();
  }

  /**
   * getCatalog bounded by the overall load budget. When the budget runs out the
   * cache-only view is returned instead; the sync itself keeps running and still
   * writes through when it finishes.
   */
  async loadCatalog(): Promise<Album[]> {
    try {
      return await withTimeout(() => this.getCatalog(), this.loadBudgetMs, 'load catalog');
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;
      logger.warn('Catalog load exceeded budget, falling back to cached data', { budgetMs: this.loadBudgetMs });
      return this.getCatalogCacheOnly();
    }
  }

  /**
   * Never rejects: any failure or absence yields [].
   */
  async getCatalogCacheOnly(): Promise<Album[]> {
    try {
      return this.catalogCache.readMemory() ?? (await this.catalogCache.readPersistedOrMiss()) ?? [];
    } catch (error) {
      logger.warn('Cache-only catalog read failed', { error: serializeError(error) });
      return [];
    }
  }

  async getTracks(albumId: string): Promise<readonly Song[]> {
    const albums = await this.getCatalog();
    const album = albums.find(candidate => candidate.id === albumId);
    if (!album) {
      throw CatalogError.notFound('Album', albumId);
    }
    return album.tracks;
  }

  async getTrackById(trackId: string): Promise<Song | null> {
    const albums = await this.getCatalog();
    for (const album of albums) {
      const track = album.findTrack(trackId);
      if (track) return track;
    }
    return null;
  }

  async searchAlbums(query: string): Promise<Album[]> {
    const needle = query.trim();
    if (!needle) return [];
    const albums = await this.getCatalog();
    return albums.filter(album => album.matches(needle));
  }

  async searchTracks(query: string): Promise<Song[]> {
    const needle = query.trim();
    if (!needle) return [];
    const albums = await this.getCatalog();
    return albums.flatMap(album => album.tracks.filter(track => track.matches(needle)));
  }

  /**
   * Drops both catalog tiers and performs a full sync. Resolved URLs are kept.
   */
  async refreshCache(): Promise<Album[]> {
    logger.info('Refreshing catalog');
    await this.catalogCache.clear();
    return this.syncAndStore();
  }

  /**
   * Re-fetches one album and splices it into the cached catalog, leaving the others untouched.
   * An album that no longer has tracks is reported as not found.
   */
  async refreshAlbum(albumId: string): Promise<Album> {
    const albums = await this.getCatalog();
    const existing = albums.find(album => album.id === albumId);
    if (!existing) {
      throw CatalogError.notFound('Album', albumId);
    }

    await this.ensureUrlCacheLoaded();
    const refreshed = await this.synchronizer.syncAlbum(existing.artist ?? '', existing.albumName);
    if (!refreshed) {
      throw CatalogError.notFound('Album', albumId);
    }

    await this.catalogCache.replaceAlbum(refreshed);
    await this.urlCache.save();
    logger.info('Album refreshed', { albumId, tracks: refreshed.trackCount });
    return refreshed;
  }

  async clearCache(): Promise<void> {
    await this.catalogCache.clear();
  }

  onProgress(listener: ProgressListener): () => void {
    return this.progress.subscribe(listener);
  }

  dispose(): void {
    this.progress.dispose();
    this.catalogCache.invalidate();
  }

  private syncAndStore(): Promise<Album[]> {
    // concurrent misses share one remote sync
    if (this.inFlightSync) return this.inFlightSync;

    const run = async (): Promise<Album[]> => {
      await this.ensureUrlCacheLoaded();
      const albums = await this.synchronizer.syncCatalog();
      await this.catalogCache.write(albums);
      return albums;
    };

    this.inFlightSync = run().finally(() => {
      this.inFlightSync = null;
    });
    return this.inFlightSync;
  }

  private ensureUrlCacheLoaded(): Promise<void> {
    this.urlCacheLoaded ??= this.urlCache.load();
    return this.urlCacheLoaded;
  }
}
