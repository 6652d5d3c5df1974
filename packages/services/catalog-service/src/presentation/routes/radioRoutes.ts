import { Router } from 'express';
import { randomUUID } from 'crypto';
import { asyncHandler, sendSuccess, type SSEManager } from '@robin-radio/platform-core';
import type { RadioPick, RadioStation } from '../../application/services/RadioStation';
import { CatalogError } from '../../application/errors';

export function createRadioRoutes(radio: RadioStation, sse: SSEManager): Router {
  const router = Router();
  const listeners = new Set<string>();
  let nowPlaying: RadioPick | null = null;

  router.get(
    '/next',
    asyncHandler(async (_req, res) => {
      const pick = await radio.nextTrack();
      if (!pick) {
        throw CatalogError.emptyCatalog();
      }
      sendSuccess(res, pick);
    })
  );

  // the station runs only while at least one listener is connected
  router.get('/stream', (req, res) => {
    const clientId = randomUUID();
    if (!sse.addClient(req, res, clientId)) return;

    listeners.add(clientId);
    if (radio.isRunning && nowPlaying) {
      sse.sendToClient(clientId, 'track', nowPlaying);
    } else if (!radio.isRunning) {
      radio.start(pick => {
        nowPlaying = pick;
        for (const id of listeners) sse.sendToClient(id, 'track', pick);
      });
    }

    req.on('close', () => {
      listeners.delete(clientId);
      if (listeners.size === 0) {
        radio.stop();
        nowPlaying = null;
      }
    });
  });

  return router;
}
