import type { DownloadItem } from '../../domains/offline/entities/DownloadItem';
import type { OfflineSong } from '../../domains/offline/entities/OfflineSong';

export interface IDownloadRepository {
  findAllDownloadItems(): Promise<DownloadItem[]>;
  saveDownloadItem(item: DownloadItem): Promise<void>;
  deleteDownloadItem(id: string): Promise<void>;

  findAllOfflineSongs(): Promise<OfflineSong[]>;
  findOfflineSong(songId: string): Promise<OfflineSong | null>;
  saveOfflineSong(song: OfflineSong): Promise<void>;
  deleteOfflineSong(songId: string): Promise<void>;
}
