/**
 * Download Item
 * One download job. Updates always produce a new object (copy-and-replace).
 */

import { z } from 'zod';

export const DOWNLOAD_STATUSES = ['pending', 'downloading', 'paused', 'completed', 'failed', 'cancelled'] as const;

export type DownloadStatus =
  | 'pending' // Queued, waiting for a free transfer slot
  | 'downloading' // Transfer in flight
  | 'paused' // Parked by the user; skipped by the scheduler until resumed
  | 'completed' // File written and offline record created
  | 'failed' // Transfer or write failed; retry moves it back to pending
  | 'cancelled'; // Stopped by the user

/**
 * Allowed transitions. `completed` and `cancelled` are terminal.
 */
export const DOWNLOAD_TRANSITIONS: Readonly<Record<DownloadStatus, readonly DownloadStatus[]>> = {
  pending: ['downloading', 'cancelled'],
  downloading: ['completed', 'failed', 'paused', 'cancelled'],
  paused: ['pending', 'cancelled'],
  failed: ['pending', 'cancelled'],
  completed: [],
  cancelled: [],
};

export const HISTORY_STATUSES: readonly DownloadStatus[] = ['completed', 'failed', 'cancelled'];

export function canTransition(from: DownloadStatus, to: DownloadStatus): boolean {
  return DOWNLOAD_TRANSITIONS[from].includes(to);
}

export const DownloadItemSchema = z.object({
  id: z.string().min(1),
  songId: z.string().min(1),
  songName: z.string(),
  artist: z.string(),
  albumName: z.string().optional(),
  url: z.string().min(1),
  status: z.enum(DOWNLOAD_STATUSES),
  progress: z.number().min(0).max(1),
  totalBytes: z.number().int().nonnegative().optional(),
  downloadedBytes: z.number().int().nonnegative().optional(),
  createdAt: z.string().datetime(),
  errorMessage: z.string().optional(),
});

export type DownloadItem = Readonly<z.infer<typeof DownloadItemSchema>>;

export type DownloadItemPatch = Partial<Omit<DownloadItem, 'id' | 'songId' | 'createdAt'>>;

export function updateDownloadItem(item: DownloadItem, patch: DownloadItemPatch): DownloadItem {
  return { ...item, ...patch };
}
