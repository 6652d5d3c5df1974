/**
 * Catalog Routes
 * Catalog reads, search, cache maintenance and the loading-progress event stream.
 */

import { Router } from 'express';
import { z } from 'zod';
import { randomUUID } from 'crypto';
import { asyncHandler, sendSuccess, validateQuery, type SSEManager } from '@robin-radio/platform-core';
import type { MusicLibraryService } from '../../application/services/MusicLibraryService';
import { CatalogError } from '../../application/errors';

const SearchQuerySchema = z.object({
  q: z.string().max(200).default(''),
});

type SearchQuery = z.infer<typeof SearchQuerySchema>;

export function createCatalogRoutes(library: MusicLibraryService, sse: SSEManager): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      sendSuccess(res, await library.loadCatalog());
    })
  );

  router.get(
    '/cached',
    asyncHandler(async (_req, res) => {
      sendSuccess(res, await library.getCatalogCacheOnly());
    })
  );

  router.get(
    '/albums/:albumId/tracks',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await library.getTracks(req.params.albumId));
    })
  );

  router.post(
    '/albums/:albumId/refresh',
    asyncHandler(async (req, res) => {
      sendSuccess(res, await library.refreshAlbum(req.params.albumId));
    })
  );

  router.get(
    '/tracks/:trackId',
    asyncHandler(async (req, res) => {
      const track = await library.getTrackById(req.params.trackId);
      if (!track) {
        throw CatalogError.notFound('Track', req.params.trackId);
      }
      sendSuccess(res, track);
    })
  );

  router.get(
    '/search/albums',
    validateQuery(SearchQuerySchema),
    asyncHandler(async (_req, res) => {
      const { q }: SearchQuery = res.locals.query;
      sendSuccess(res, await library.searchAlbums(q));
    })
  );

  router.get(
    '/search/tracks',
    validateQuery(SearchQuerySchema),
    asyncHandler(async (_req, res) => {
      const { q }: SearchQuery = res.locals.query;
      sendSuccess(res, await library.searchTracks(q));
    })
  );

  router.post(
    '/refresh',
    asyncHandler(async (_req, res) => {
      sendSuccess(res, await library.refreshCache());
    })
  );

  router.delete(
    '/cache',
    asyncHandler(async (_req, res) => {
      await library.clearCache();
      sendSuccess(res, { cleared: true });
    })
  );

  router.get('/progress', (req, res) => {
    const clientId = randomUUID();
    if (!sse.addClient(req, res, clientId)) return;

    const unsubscribe = library.onProgress(progress => {
      sse.sendToClient(clientId, 'progress', progress);
    });
    req.on('close', unsubscribe);
  });

  return router;
}
