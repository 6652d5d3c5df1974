/**
 * Download Routes
 * Download queue control under /api/downloads and offline library under /api/offline.
 */

import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, sendCreated, sendSuccess, validateBody } from '@robin-radio/platform-core';
import type { DownloadQueueManager } from '../../application/services/DownloadQueueManager';

const EnqueueDownloadSchema = z.object({
  id: z.string().min(1),
  songName: z.string().min(1),
  artist: z.string().min(1),
  albumName: z.string().optional(),
  songUrl: z.string().url(),
  duration: z.number().nonnegative().optional(),
});

export function createDownloadRoutes(downloads: DownloadQueueManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    sendSuccess(res, {
      active: downloads.activeDownloads,
      queued: downloads.downloadQueue,
      all: downloads.allDownloads,
    });
  });

  router.post(
    '/',
    validateBody(EnqueueDownloadSchema),
    asyncHandler(async (req, res) => {
      const song = EnqueueDownloadSchema.parse(req.body);
      const id = await downloads.enqueue(song);
      sendCreated(res, { id });
    })
  );

  // before '/:id' so "history" is not read as an id
  router.delete(
    '/history',
    asyncHandler(async (_req, res) => {
      const removed = await downloads.clearDownloadHistory();
      sendSuccess(res, { removed });
    })
  );

  router.post(
    '/:id/pause',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await downloads.pause(req.params.id));
    })
  );

  router.post(
    '/:id/resume',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await downloads.resume(req.params.id));
    })
  );

  router.post(
    '/:id/cancel',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await downloads.cancel(req.params.id));
    })
  );

  router.post(
    '/:id/retry',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await downloads.retry(req.params.id));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      await downloads.removeDownloadItem(req.params.id);
      sendSuccess(res, { removed: req.params.id });
    })
  );

  return router;
}

export function createOfflineRoutes(downloads: DownloadQueueManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    sendSuccess(res, { songs: downloads.offlineSongs, totalBytes: downloads.getTotalStorageUsed() });
  });

  router.delete(
    '/',
    asyncHandler(async (_req, res) => {
      await downloads.clearAllOfflineData();
      sendSuccess(res, { cleared: true });
    })
  );

  router.delete(
    '/:songId',
    asyncHandler(async (req, res) => {
      await downloads.deleteOfflineSong(req.params.songId);
      sendSuccess(res, { removed: req.params.songId });
    })
  );

  return router;
}
