/**
 * Catalog Synchronizer
 *
 * Two-pass fetch of the remote catalog:
 *  1. discovery lists every artist and its album prefixes, producing the total album estimate;
 *  2. processing lists each album in fixed-size parallel batches and builds Album/Song aggregates.
 *
 * Per-artist, per-album and per-song failures are logged and skipped. Only a failure of the
 * root listing, or an empty result, fails the sync.
 */

import {
  TimeoutError,
  getLogger,
  runInBatches,
  serializeError,
  toError,
  withRetry,
  withTimeout,
  type BatchSettledEvent,
  type RetryOptions,
} from '@robin-radio/platform-core';
import { Album } from '../../domains/catalog/entities/Album';
import { Song } from '../../domains/catalog/entities/Song';
import {
  CATALOG_ROOT,
  albumPath,
  isImageFile,
  lastSegment,
} from '../../domains/catalog/value-objects/CatalogPath';
import { createLoadingProgress, processingFraction } from '../../domains/catalog/value-objects/LoadingProgress';
import type { CatalogListing, IRemoteCatalogStore } from '../interfaces/IRemoteCatalogStore';
import { CatalogError } from '../errors';
import type { ResolvedUrlCache } from './ResolvedUrlCache';
import type { ProgressEventStream } from './ProgressEventStream';

const logger = getLogger('catalog-service-synchronizer');

export interface CatalogSyncTimeouts {
  rootListingMs: number;
  artistListingMs: number;
  albumListingMs: number;
}

export const DEFAULT_SYNC_TIMEOUTS: CatalogSyncTimeouts = {
  rootListingMs: 15000,
  artistListingMs: 10000,
  albumListingMs: 8000,
};

export const DEFAULT_SYNC_BATCH_SIZE = 3;
const ETA_WINDOW = 3;

export interface CatalogSynchronizerOptions {
  timeouts?: Partial<CatalogSyncTimeouts>;
  batchSize?: number;
  retry?: RetryOptions;
}

interface AlbumTask {
  artist: string;
  albumPrefix: string;
}

export class CatalogSynchronizer {
  private readonly timeouts: CatalogSyncTimeouts;
  private readonly batchSize: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly remoteStore: IRemoteCatalogStore,
    private readonly urlCache: ResolvedUrlCache,
    private readonly progress: ProgressEventStream,
    options: CatalogSynchronizerOptions = {}
  ) {
    this.timeouts = { ...DEFAULT_SYNC_TIMEOUTS, ...options.timeouts };
    this.batchSize = options.batchSize ?? DEFAULT_SYNC_BATCH_SIZE;
    this.retry = options.retry ?? {};
  }

  async syncCatalog(): Promise<Album[]> {
    const startedAt = Date.now();
    try {
      const root = await this.list(CATALOG_ROOT, this.timeouts.rootListingMs, 'list artists');
      const artists = root.prefixes.map(prefix => lastSegment(prefix)).filter(name => name.length > 0);
      logger.info('Catalog discovery started', { provider: this.remoteStore.providerName, artists: artists.length });

      this.progress.emit(
        createLoadingProgress({
          message: `Found ${artists.length} artists`,
          progress: 0.05,
          itemsProcessed: 0,
          totalItems: artists.length,
          elapsedMs: Date.now() - startedAt,
        })
      );

      const tasks = await this.discover(root, artists);
      this.progress.emit(
        createLoadingProgress({
          message: `Discovered ${tasks.length} albums from ${artists.length} artists`,
          progress: 0.1,
          itemsProcessed: 0,
          totalItems: tasks.length,
          elapsedMs: Date.now() - startedAt,
        })
      );

      const albums = await this.processAlbums(tasks, startedAt);

      await this.urlCache.save();
      this.progress.emit(
        createLoadingProgress({
          message: `Loaded ${albums.length} albums`,
          progress: 1,
          itemsProcessed: tasks.length,
          totalItems: tasks.length,
          elapsedMs: Date.now() - startedAt,
          estimatedRemainingMs: 0,
        })
      );

      if (albums.length === 0) {
        throw CatalogError.emptyCatalog();
      }

      logger.info('Catalog sync completed', {
        albums: albums.length,
        tracks: albums.reduce((total, album) => total + album.trackCount, 0),
        durationMs: Date.now() - startedAt,
      });
      return albums;
    } catch (error) {
      const mapped = this.toCatalogError(error, 'catalog sync');
      logger.error('Catalog sync failed', { error: serializeError(mapped) });
      throw mapped;
    }
  }

  /**
   * Re-fetches a single album. Resolves to null when the album exists but holds no playable tracks.
   */
  async syncAlbum(artist: string, albumName: string): Promise<Album | null> {
    try {
      return await this.buildAlbum(artist, albumPath(artist, albumName));
    } catch (error) {
      throw this.toCatalogError(error, `sync album ${artist}/${albumName}`);
    }
  }

  private async discover(root: CatalogListing, artists: string[]): Promise<AlbumTask[]> {
    // one listing per artist, reused by the processing pass
    const artistListings = new Map<string, CatalogListing>();

    for (const [index, artist] of artists.entries()) {
      const prefix = root.prefixes[index];
      try {
        const listing = await this.list(prefix, this.timeouts.artistListingMs, `list albums of ${artist}`);
        artistListings.set(artist, listing);
      } catch (error) {
        logger.warn('Skipping artist, album listing failed', { artist, error: serializeError(error) });
      }
    }

    const tasks: AlbumTask[] = [];
    for (const [artist, listing] of artistListings) {
      for (const albumPrefix of listing.prefixes) {
        tasks.push({ artist, albumPrefix });
      }
    }
    return tasks;
  }

  private async processAlbums(tasks: AlbumTask[], startedAt: number): Promise<Album[]> {
    const recentBatchDurations: number[] = [];

    const onBatchSettled = (event: BatchSettledEvent): void => {
      recentBatchDurations.push(event.durationMs);
      if (recentBatchDurations.length > ETA_WINDOW) recentBatchDurations.shift();

      const averageBatchMs = recentBatchDurations.reduce((sum, ms) => sum + ms, 0) / recentBatchDurations.length;
      const remainingAlbums = event.total - event.processed;

      this.progress.emit(
        createLoadingProgress({
          message: `Processed ${event.processed} of ${event.total} albums`,
          progress: processingFraction(event.processed, event.total),
          itemsProcessed: event.processed,
          totalItems: event.total,
          elapsedMs: Date.now() - startedAt,
          estimatedRemainingMs: Math.round(averageBatchMs * Math.ceil(remainingAlbums / this.batchSize)),
        })
      );
    };

    const results = await runInBatches(
      tasks.map(task => () => this.processAlbumTask(task)),
      this.batchSize,
      onBatchSettled
    );

    const albums: Album[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled' && result.value) albums.push(result.value);
    }
    return albums;
  }

  private async processAlbumTask(task: AlbumTask): Promise<Album | null> {
    try {
      return await this.buildAlbum(task.artist, task.albumPrefix);
    } catch (error) {
      logger.warn('Skipping album, listing failed', {
        artist: task.artist,
        album: lastSegment(task.albumPrefix),
        error: serializeError(error),
      });
      return null;
    }
  }

  private async buildAlbum(artist: string, albumPrefix: string): Promise<Album | null> {
    const albumName = lastSegment(albumPrefix);
    const listing = await this.list(albumPrefix, this.timeouts.albumListingMs, `list album ${artist}/${albumName}`);

    let albumCover: string | undefined;
    for (const item of listing.items) {
      if (!isImageFile(item)) continue;
      try {
        albumCover = await this.urlCache.resolve(item);
        break;
      } catch (error) {
        logger.debug('Album cover resolution failed, trying next image', { item, error: serializeError(error) });
      }
    }

    const tracks: Song[] = [];
    for (const item of listing.items) {
      if (isImageFile(item)) continue;
      const fileName = lastSegment(item);
      try {
        const songUrl = await this.urlCache.resolve(item);
        tracks.push(
          Song.create({
            id: Song.deriveId(artist, albumName, fileName),
            songName: fileName,
            artist,
            albumName,
            songUrl,
          })
        );
      } catch (error) {
        logger.warn('Skipping song, URL resolution failed', { artist, album: albumName, fileName, error: serializeError(error) });
      }
    }

    if (tracks.length === 0) {
      logger.debug('Discarding album without tracks', { artist, album: albumName });
      return null;
    }

    return Album.create({
      id: Album.deriveId(artist, albumName),
      albumName,
      artist,
      albumCover,
      tracks,
    });
  }

  private list(path: string, timeoutMs: number, operation: string): Promise<CatalogListing> {
    return withRetry(() => withTimeout(() => this.remoteStore.listChildren(path), timeoutMs, operation), {
      ...this.retry,
      label: operation,
    });
  }

  private toCatalogError(error: unknown, operation: string): CatalogError {
    if (error instanceof CatalogError) return error;
    if (error instanceof TimeoutError) return CatalogError.timeout(error.operation, error);
    return CatalogError.networkError(operation, toError(error));
  }
}
