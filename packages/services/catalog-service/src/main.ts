// Load environment variables first (never override values already set)
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Catalog Service entry point
 */

import {
  SSEManager,
  createLogger,
  registerShutdownHook,
  serializeError,
  setupGracefulShutdown,
} from '@robin-radio/platform-core';
import { SERVICE_NAME, loadServiceConfig } from './config/service-config';
import { createServiceRegistry } from './infrastructure/ServiceFactory';
import { createApp } from './presentation/app';

const logger = createLogger(SERVICE_NAME);

async function main(): Promise<void> {
  const serviceConfig = loadServiceConfig();
  const registry = createServiceRegistry(serviceConfig);
  const sse = new SSEManager();

  await registry.downloads.initialize();

  const app = createApp(registry, sse);
  const server = app.listen(serviceConfig.port, () => {
    logger.info('Catalog service listening', { port: serviceConfig.port, remoteStore: registry.remoteStore.providerName });
  });

  // warm the catalog in the background; requests fall back to cached data meanwhile
  void registry.library.loadCatalog().then(
    albums => logger.info('Catalog warmed', { albums: albums.length }),
    (error: unknown) => logger.warn('Catalog warm-up failed', { error: serializeError(error) })
  );

  registerShutdownHook('drain', 'sse', async () => {
    sse.shutdown();
  });
  registerShutdownHook('queues', 'radio', async () => {
    registry.radio.stop();
  });
  registerShutdownHook('queues', 'downloads', async () => {
    registry.downloads.dispose();
    await registry.downloads.whenIdle();
  });
  registerShutdownHook('connections', 'library', async () => {
    registry.library.dispose();
  });
  registerShutdownHook('connections', 'kv-store', () => registry.kvStore.close());

  setupGracefulShutdown(server);
}

main().catch((error: unknown) => {
  logger.error('Catalog service failed to start', { error: serializeError(error) });
  process.exit(1);
});
