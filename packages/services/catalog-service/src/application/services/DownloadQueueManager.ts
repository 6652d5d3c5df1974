/**
 * Download Queue Manager
 *
 * Bounded set of concurrent whole-file downloads fed by a FIFO pending queue.
 * Every DownloadItem change is a copy-and-replace, persisted individually and
 * broadcast to change listeners.
 *
 * Pause and cancel are cooperative: the transfer already in flight runs to its own
 * completion, but its outcome is discarded once the item has left the active set.
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage, getLogger, serializeError } from '@robin-radio/platform-core';
import {
  HISTORY_STATUSES,
  canTransition,
  updateDownloadItem,
  type DownloadItem,
  type DownloadItemPatch,
  type DownloadStatus,
} from '../../domains/offline/entities/DownloadItem';
import type { OfflineSong } from '../../domains/offline/entities/OfflineSong';
import { buildOfflineFileName } from '../../domains/offline/offline-file-name';
import type { IDownloadRepository } from '../interfaces/IDownloadRepository';
import type { IFileTransfer, TransferProgress } from '../interfaces/IFileTransfer';
import type { IOfflineFileStore } from '../interfaces/IOfflineFileStore';
import { DownloadError } from '../errors';

const logger = getLogger('catalog-service-download-queue');

export const DEFAULT_DOWNLOAD_CONCURRENCY = 3;

export interface DownloadableSong {
  id: string;
  songName: string;
  artist: string;
  albumName?: string;
  songUrl: string;
  duration?: number;
}

export type DownloadChangeEvent =
  | { type: 'download-updated'; item: DownloadItem }
  | { type: 'download-removed'; id: string }
  | { type: 'offline-added'; song: OfflineSong }
  | { type: 'offline-removed'; songId: string };

export type DownloadChangeListener = (event: DownloadChangeEvent) => void;

export interface DownloadQueueManagerOptions {
  concurrency?: number;
}

export class DownloadQueueManager {
  private readonly concurrency: number;
  private readonly items = new Map<string, DownloadItem>();
  private readonly offline = new Map<string, OfflineSong>();
  private readonly durations = new Map<string, number>();
  private pendingQueue: string[] = [];
  /** download id → token of the transfer currently allowed to commit */
  private readonly active = new Map<string, number>();
  /** transfer token → file written by that attempt and not yet owned by an offline song */
  private readonly attemptFiles = new Map<number, string>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly listeners = new Set<DownloadChangeListener>();
  private nextToken = 0;
  private initialized: Promise<void> | null = null;
  private disposed = false;

  constructor(
    private readonly repository: IDownloadRepository,
    private readonly transfer: IFileTransfer,
    private readonly files: IOfflineFileStore,
    options: DownloadQueueManagerOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_DOWNLOAD_CONCURRENCY;
  }

  get activeDownloads(): DownloadItem[] {
    return this.lookup([...this.active.keys()]);
  }

  get downloadQueue(): DownloadItem[] {
    return this.lookup(this.pendingQueue);
  }

  get allDownloads(): DownloadItem[] {
    return [...this.items.values()];
  }

  get offlineSongs(): OfflineSong[] {
    return [...this.offline.values()];
  }

  /**
   * Loads persisted state and re-queues unfinished work. Items left `downloading` by a
   * previous process are demoted to `pending` and restart from the first byte.
   */
  initialize(): Promise<void> {
    this.initialized ??= this.restore();
    return this.initialized;
  }

  async enqueue(song: DownloadableSong): Promise<string> {
    const existing = this.allDownloads.find(item => item.songId === song.id);
    if (existing) {
      throw DownloadError.alreadyExists(song.id, existing.id);
    }

    const item: DownloadItem = {
      id: `download-${uuidv4()}`,
      songId: song.id,
      songName: song.songName,
      artist: song.artist,
      albumName: song.albumName,
      url: song.songUrl,
      status: 'pending',
      progress: 0,
      createdAt: new Date().toISOString(),
    };
    if (song.duration !== undefined) this.durations.set(item.id, song.duration);

    this.store(item);
    this.pendingQueue.push(item.id);
    await this.repository.saveDownloadItem(item);
    logger.info('Download enqueued', { downloadId: item.id, songId: song.id });

    this.processQueue();
    return item.id;
  }

  async pause(id: string): Promise<DownloadItem> {
    const item = this.requireItem(id);
    this.assertTransition(item, 'paused');

    const paused = this.store(updateDownloadItem(item, { status: 'paused' }));
    this.active.delete(id);
    if (!this.pendingQueue.includes(id)) this.pendingQueue.push(id);
    await this.repository.saveDownloadItem(paused);
    logger.info('Download paused', { downloadId: id });

    this.processQueue();
    return paused;
  }

  async resume(id: string): Promise<DownloadItem> {
    const item = this.requireItem(id);
    if (item.status !== 'paused') {
      throw DownloadError.invalidTransition(id, item.status, 'pending');
    }

    const resumed = this.store(updateDownloadItem(item, { status: 'pending' }));
    if (!this.pendingQueue.includes(id)) this.pendingQueue.push(id);
    await this.repository.saveDownloadItem(resumed);

    this.processQueue();
    return resumed;
  }

  /**
   * Valid from every non-terminal state; a no-op on completed or cancelled items.
   * A file is removed only when this item's own attempt already wrote it.
   */
  async cancel(id: string): Promise<DownloadItem> {
    const item = this.requireItem(id);
    if (item.status === 'completed' || item.status === 'cancelled') {
      return item;
    }

    const wasDownloading = item.status === 'downloading';
    const token = this.active.get(id);
    const cancelled = this.store(updateDownloadItem(item, { status: 'cancelled' }));
    this.active.delete(id);
    this.pendingQueue = this.pendingQueue.filter(queuedId => queuedId !== id);
    await this.repository.saveDownloadItem(cancelled);
    logger.info('Download cancelled', { downloadId: id, wasDownloading });

    if (token !== undefined) {
      await this.removeAttemptFile(id, token);
    }

    this.processQueue();
    return cancelled;
  }

  async retry(id: string): Promise<DownloadItem> {
    const item = this.requireItem(id);
    if (item.status !== 'failed') {
      throw DownloadError.invalidTransition(id, item.status, 'pending');
    }

    const retried = this.store(
      updateDownloadItem(item, { status: 'pending', progress: 0, downloadedBytes: undefined, errorMessage: undefined })
    );
    if (!this.pendingQueue.includes(id)) this.pendingQueue.push(id);
    await this.repository.saveDownloadItem(retried);

    this.processQueue();
    return retried;
  }

  async removeDownloadItem(id: string): Promise<void> {
    await this.cancel(id);
    await this.repository.deleteDownloadItem(id);
    this.items.delete(id);
    this.durations.delete(id);
    this.notify({ type: 'download-removed', id });
  }

  /**
   * Deletes every completed, failed or cancelled item. Pending, paused and active items are untouched.
   */
  async clearDownloadHistory(): Promise<number> {
    const history = this.allDownloads.filter(item => HISTORY_STATUSES.includes(item.status));
    for (const item of history) {
      await this.repository.deleteDownloadItem(item.id);
      this.items.delete(item.id);
      this.durations.delete(item.id);
      this.notify({ type: 'download-removed', id: item.id });
    }
    logger.info('Download history cleared', { removed: history.length });
    return history.length;
  }

  getDownloadsByStatus(status: DownloadStatus): DownloadItem[] {
    return this.allDownloads.filter(item => item.status === status);
  }

  getOfflineSong(songId: string): OfflineSong | null {
    return this.offline.get(songId) ?? null;
  }

  isSongOffline(songId: string): boolean {
    return this.offline.has(songId);
  }

  /**
   * Removes the file and the offline record, plus the completed download record so
   * the song can be downloaded again.
   */
  async deleteOfflineSong(songId: string): Promise<void> {
    const song = this.offline.get(songId);
    if (!song) {
      throw DownloadError.offlineSongNotFound(songId);
    }

    await this.files.remove(song.localPath);
    await this.repository.deleteOfflineSong(songId);
    this.offline.delete(songId);
    this.notify({ type: 'offline-removed', songId });

    const completed = this.allDownloads.find(item => item.songId === songId && item.status === 'completed');
    if (completed) {
      await this.repository.deleteDownloadItem(completed.id);
      this.items.delete(completed.id);
      this.notify({ type: 'download-removed', id: completed.id });
    }
  }

  getTotalStorageUsed(): number {
    return this.offlineSongs.reduce((total, song) => total + (song.fileSize ?? 0), 0);
  }

  /**
   * Drops every download record, every offline record and the offline directory.
   * Transfers still in flight lose their slot and their results are discarded.
   */
  async clearAllOfflineData(): Promise<void> {
    this.active.clear();
    this.pendingQueue = [];

    for (const id of [...this.items.keys()]) {
      await this.repository.deleteDownloadItem(id);
      this.notify({ type: 'download-removed', id });
    }
    for (const songId of [...this.offline.keys()]) {
      await this.repository.deleteOfflineSong(songId);
      this.notify({ type: 'offline-removed', songId });
    }
    this.items.clear();
    this.offline.clear();
    this.durations.clear();

    await this.files.removeAll();
    logger.info('All offline data cleared');
  }

  onChange(listener: DownloadChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once no transfer is running, including transfers promoted while waiting.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
    logger.info('Download queue disposed', { inFlight: this.inFlight.size });
  }

  private async restore(): Promise<void> {
    const [items, offlineSongs] = await Promise.all([
      this.repository.findAllDownloadItems(),
      this.repository.findAllOfflineSongs(),
    ]);

    for (const song of offlineSongs) {
      this.offline.set(song.id, song);
    }

    const ordered = [...items].sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
    let recovered = 0;
    for (const item of ordered) {
      let current = item;
      if (item.status === 'downloading') {
        current = updateDownloadItem(item, { status: 'pending', progress: 0, downloadedBytes: undefined });
        await this.repository.saveDownloadItem(current);
        recovered++;
      }
      this.items.set(current.id, current);
      if (current.status === 'pending') this.pendingQueue.push(current.id);
    }

    logger.info('Download queue restored', {
      items: ordered.length,
      offlineSongs: offlineSongs.length,
      recovered,
      queued: this.pendingQueue.length,
    });
    this.processQueue();
  }

  private processQueue(): void {
    if (this.disposed) return;

    while (this.active.size < this.concurrency) {
      const nextIndex = this.pendingQueue.findIndex(id => this.items.get(id)?.status === 'pending');
      if (nextIndex < 0) break;

      const [id] = this.pendingQueue.splice(nextIndex, 1);
      const item = this.items.get(id);
      if (!item) continue;

      const token = ++this.nextToken;
      this.active.set(id, token);
      const downloading = this.store(updateDownloadItem(item, { status: 'downloading', errorMessage: undefined }));

      const run = this.runTransfer(downloading, token).finally(() => {
        this.inFlight.delete(run);
      });
      this.inFlight.add(run);
    }
  }

  /**
   * Never rejects. Failures end as a `failed` item; the slot is always released.
   */
  private async runTransfer(item: DownloadItem, token: number): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.repository.saveDownloadItem(item);
      const result = await this.transfer.fetchFile(item.url, progress => this.onTransferProgress(item.id, token, progress));

      if (!this.isCurrent(item.id, token)) {
        logger.debug('Discarding transfer result, item left the active set', { downloadId: item.id });
        return;
      }

      const localPath = await this.files.write(buildOfflineFileName(item.songName, item.artist), result.data);
      this.attemptFiles.set(token, localPath);
      if (!this.isCurrent(item.id, token)) {
        logger.debug('Discarding file written after the item left the active set', { downloadId: item.id });
        await this.removeAttemptFile(item.id, token);
        return;
      }

      const fileSize = result.data.length;
      const duration = this.durations.get(item.id);
      const offlineSong: OfflineSong = {
        id: item.songId,
        songName: item.songName,
        artist: item.artist,
        albumName: item.albumName,
        localPath,
        originalUrl: item.url,
        ...(duration !== undefined && { duration }),
        downloadDate: new Date().toISOString(),
        fileSize,
      };

      const latest = this.items.get(item.id) ?? item;
      const completed = this.store(
        updateDownloadItem(latest, { status: 'completed', progress: 1, totalBytes: fileSize, downloadedBytes: fileSize })
      );
      this.offline.set(offlineSong.id, offlineSong);
      this.notify({ type: 'offline-added', song: offlineSong });

      await this.repository.saveOfflineSong(offlineSong);
      await this.repository.saveDownloadItem(completed);
      logger.info('Download completed', { downloadId: item.id, fileSize, durationMs: Date.now() - startedAt });
    } catch (error) {
      await this.failTransfer(item.id, token, error);
    } finally {
      this.attemptFiles.delete(token);
      if (this.active.get(item.id) === token) this.active.delete(item.id);
      this.processQueue();
    }
  }

  private async failTransfer(id: string, token: number, error: unknown): Promise<void> {
    const current = this.items.get(id);
    if (!current || current.status !== 'downloading' || !this.isCurrent(id, token)) {
      logger.debug('Ignoring failure of a superseded transfer', { downloadId: id, error: serializeError(error) });
      return;
    }

    const failed = this.store(updateDownloadItem(current, { status: 'failed', errorMessage: errorMessage(error) }));
    logger.warn('Download failed', { downloadId: id, error: serializeError(error) });
    try {
      await this.repository.saveDownloadItem(failed);
    } catch (persistError) {
      logger.error('Failed to persist failed download', { downloadId: id, error: serializeError(persistError) });
    }
  }

  private onTransferProgress(id: string, token: number, progress: TransferProgress): void {
    const current = this.items.get(id);
    if (!current || !this.isCurrent(id, token)) return;

    const fraction = progress.totalBytes ? Math.min(1, progress.receivedBytes / progress.totalBytes) : current.progress;
    const patch: DownloadItemPatch = {
      progress: fraction,
      downloadedBytes: progress.receivedBytes,
      ...(progress.totalBytes !== undefined && { totalBytes: progress.totalBytes }),
    };
    const updated = this.store(updateDownloadItem(current, patch));
    void this.repository.saveDownloadItem(updated).catch((error: unknown) => {
      logger.warn('Failed to persist download progress', { downloadId: id, error: serializeError(error) });
    });
  }

  /**
   * Files still referenced by an offline song are kept: distinct songs can share a sanitized file name.
   */
  private async removeAttemptFile(id: string, token: number): Promise<void> {
    const filePath = this.attemptFiles.get(token);
    if (filePath === undefined) return;
    this.attemptFiles.delete(token);

    if (this.offlineSongs.some(song => song.localPath === filePath)) {
      logger.warn('Keeping file owned by another offline song', { downloadId: id, filePath });
      return;
    }
    try {
      await this.files.remove(filePath);
    } catch (error) {
      logger.warn('Failed to delete discarded download', { downloadId: id, error: serializeError(error) });
    }
  }

  private isCurrent(id: string, token: number): boolean {
    return this.active.get(id) === token;
  }

  private requireItem(id: string): DownloadItem {
    const item = this.items.get(id);
    if (!item) {
      throw DownloadError.downloadNotFound(id);
    }
    return item;
  }

  private assertTransition(item: DownloadItem, to: DownloadStatus): void {
    if (!canTransition(item.status, to)) {
      throw DownloadError.invalidTransition(item.id, item.status, to);
    }
  }

  private store(item: DownloadItem): DownloadItem {
    this.items.set(item.id, item);
    this.notify({ type: 'download-updated', item });
    return item;
  }

  private lookup(ids: Iterable<string>): DownloadItem[] {
    const found: DownloadItem[] = [];
    for (const id of ids) {
      const item = this.items.get(id);
      if (item) found.push(item);
    }
    return found;
  }

  private notify(event: DownloadChangeEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        logger.warn('Download change listener threw', { error: serializeError(error) });
      }
    }
  }
}
