import express, { type Express } from 'express';
import { errorHandler, notFoundHandler, requestLogger, type SSEManager } from '@robin-radio/platform-core';
import type { ServiceRegistry } from '../infrastructure/ServiceFactory';
import { SERVICE_NAME } from '../config/service-config';
import {
  createCatalogRoutes,
  createDownloadRoutes,
  createHealthRoutes,
  createOfflineRoutes,
  createRadioRoutes,
} from './routes';

export function createApp(registry: ServiceRegistry, sse: SSEManager): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger(SERVICE_NAME));

  app.use(createHealthRoutes(registry));
  app.use('/api/catalog', createCatalogRoutes(registry.library, sse));
  app.use('/api/radio', createRadioRoutes(registry.radio, sse));
  app.use('/api/downloads', createDownloadRoutes(registry.downloads));
  app.use('/api/offline', createOfflineRoutes(registry.downloads));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
