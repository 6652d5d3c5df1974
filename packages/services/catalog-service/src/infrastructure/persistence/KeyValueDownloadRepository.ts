/**
 * Download/offline record store on top of the key-value store.
 * One JSON record per key: `download_item:<id>` and `offline_song:<songId>`.
 * Records that fail validation on read are logged and skipped.
 */

import type { z } from 'zod';
import { getLogger, type IKeyValueStore } from '@robin-radio/platform-core';
import { DownloadItemSchema, type DownloadItem } from '../../domains/offline/entities/DownloadItem';
import { OfflineSongSchema, type OfflineSong } from '../../domains/offline/entities/OfflineSong';
import type { IDownloadRepository } from '../../application/interfaces/IDownloadRepository';

const logger = getLogger('catalog-service-download-repository');

export const DOWNLOAD_ITEM_PREFIX = 'download_item:';
export const OFFLINE_SONG_PREFIX = 'offline_song:';

export class KeyValueDownloadRepository implements IDownloadRepository {
  constructor(private readonly kvStore: IKeyValueStore) {}

  findAllDownloadItems(): Promise<DownloadItem[]> {
    return this.readAll(DOWNLOAD_ITEM_PREFIX, DownloadItemSchema);
  }

  async saveDownloadItem(item: DownloadItem): Promise<void> {
    await this.kvStore.set(DOWNLOAD_ITEM_PREFIX + item.id, JSON.stringify(item));
  }

  async deleteDownloadItem(id: string): Promise<void> {
    await this.kvStore.remove(DOWNLOAD_ITEM_PREFIX + id);
  }

  findAllOfflineSongs(): Promise<OfflineSong[]> {
    return this.readAll(OFFLINE_SONG_PREFIX, OfflineSongSchema);
  }

  async findOfflineSong(songId: string): Promise<OfflineSong | null> {
    const key = OFFLINE_SONG_PREFIX + songId;
    const raw = await this.kvStore.get(key);
    return raw === null ? null : this.parseRecord(key, raw, OfflineSongSchema);
  }

  async saveOfflineSong(song: OfflineSong): Promise<void> {
    await this.kvStore.set(OFFLINE_SONG_PREFIX + song.id, JSON.stringify(song));
  }

  async deleteOfflineSong(songId: string): Promise<void> {
    await this.kvStore.remove(OFFLINE_SONG_PREFIX + songId);
  }

  private async readAll<T>(prefix: string, schema: z.ZodType<T>): Promise<T[]> {
    const keys = await this.kvStore.keys(prefix);
    const records: T[] = [];
    for (const key of keys.sort()) {
      const raw = await this.kvStore.get(key);
      if (raw === null) continue;
      const record = this.parseRecord(key, raw, schema);
      if (record !== null) records.push(record);
    }
    return records;
  }

  private parseRecord<T>(key: string, raw: string, schema: z.ZodType<T>): T | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      logger.warn('Skipping unparseable record', { key });
      return null;
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      logger.warn('Skipping invalid record', { key, issues: result.error.errors.map(issue => issue.message) });
      return null;
    }
    return result.data;
  }
}
