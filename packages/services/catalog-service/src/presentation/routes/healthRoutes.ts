import { Router } from 'express';
import { sendSuccess } from '@robin-radio/platform-core';
import type { ServiceRegistry } from '../../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../../config/service-config';

export function createHealthRoutes(registry: ServiceRegistry): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    sendSuccess(res, {
      status: 'ok',
      service: SERVICE_NAME,
      remoteStore: registry.remoteStore.providerName,
      activeDownloads: registry.downloads.activeDownloads.length,
      uptimeSeconds: Math.round(process.uptime()),
    });
  });

  return router;
}
