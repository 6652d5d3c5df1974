/**
 * Radio Station
 * Shuffle radio over the catalog: a random album, then a random track of that album.
 */

import { getLogger, serializeError } from '@robin-radio/platform-core';
import type { Album } from '../../domains/catalog/entities/Album';
import type { Song } from '../../domains/catalog/entities/Song';

const logger = getLogger('catalog-service-radio');

export const DEFAULT_RADIO_INTERVAL_MS = 3 * 60 * 1000;
export const EMPTY_CATALOG_RETRY_MS = 5000;

export interface CatalogSource {
  loadCatalog(): Promise<Album[]>;
}

export interface RadioPick {
  song: Song;
  albumId: string;
  albumCover?: string;
}

export type RadioListener = (pick: RadioPick) => void;

export interface RadioStationOptions {
  intervalMs?: number;
  emptyRetryMs?: number;
  /** Returns a float in [0, 1) */
  random?: () => number;
}

export class RadioStation {
  private readonly intervalMs: number;
  private readonly emptyRetryMs: number;
  private readonly random: () => number;
  private timer: NodeJS.Timeout | null = null;
  private listener: RadioListener | null = null;

  constructor(
    private readonly catalog: CatalogSource,
    options: RadioStationOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_RADIO_INTERVAL_MS;
    this.emptyRetryMs = options.emptyRetryMs ?? EMPTY_CATALOG_RETRY_MS;
    this.random = options.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.listener !== null;
  }

  async nextTrack(): Promise<RadioPick | null> {
    const albums = (await this.catalog.loadCatalog()).filter(album => album.trackCount > 0);
    if (albums.length === 0) return null;

    const album = albums[this.pickIndex(albums.length)];
    const song = album.tracks[this.pickIndex(album.tracks.length)];
    return { song, albumId: album.id, albumCover: album.albumCover };
  }

  /**
   * Emits a pick now and then once per interval until stopped. An empty catalog
   * or a failed load is retried after the short retry delay.
   */
  start(listener: RadioListener): void {
    this.stop();
    this.listener = listener;
    logger.info('Radio started', { intervalMs: this.intervalMs });
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.listener) {
      this.listener = null;
      logger.info('Radio stopped');
    }
  }

  private async tick(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;

    let delayMs = this.emptyRetryMs;
    try {
      const pick = await this.nextTrack();
      if (pick) {
        // stopped or restarted while loading
        if (this.listener !== listener) return;
        listener(pick);
        delayMs = this.intervalMs;
      } else {
        logger.debug('Catalog empty, radio will retry', { retryMs: this.emptyRetryMs });
      }
    } catch (error) {
      logger.warn('Radio pick failed, will retry', { retryMs: this.emptyRetryMs, error: serializeError(error) });
    }

    if (this.listener !== listener) return;
    this.timer = setTimeout(() => void this.tick(), delayMs);
    this.timer.unref();
  }

  private pickIndex(length: number): number {
    return Math.min(length - 1, Math.floor(this.random() * length));
  }
}
