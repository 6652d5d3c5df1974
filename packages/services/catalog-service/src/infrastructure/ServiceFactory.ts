import { createKeyValueStore, getLogger, type IKeyValueStore } from '@robin-radio/platform-core';
import type { IRemoteCatalogStore } from '../application/interfaces/IRemoteCatalogStore';
import type { IFileTransfer } from '../application/interfaces/IFileTransfer';
import type { IOfflineFileStore } from '../application/interfaces/IOfflineFileStore';
import type { IDownloadRepository } from '../application/interfaces/IDownloadRepository';
import { ProgressEventStream } from '../application/services/ProgressEventStream';
import { ResolvedUrlCache } from '../application/services/ResolvedUrlCache';
import { CatalogCache } from '../application/services/CatalogCache';
import { CatalogSynchronizer } from '../application/services/CatalogSynchronizer';
import { MusicLibraryService } from '../application/services/MusicLibraryService';
import { RadioStation } from '../application/services/RadioStation';
import { DownloadQueueManager } from '../application/services/DownloadQueueManager';
import { SERVICE_NAME, type CatalogServiceConfig, type KeyValueConfig } from '../config/service-config';
import { createRemoteCatalogStore } from './providers/CatalogStoreFactory';
import { KeyValueDownloadRepository } from './persistence/KeyValueDownloadRepository';
import { AxiosFileTransfer } from './transfer/AxiosFileTransfer';
import { LocalOfflineFileStore } from './transfer/LocalOfflineFileStore';

const logger = getLogger('catalog-service-service-factory');

export interface ServiceRegistry {
  kvStore: IKeyValueStore;
  remoteStore: IRemoteCatalogStore;
  progress: ProgressEventStream;
  library: MusicLibraryService;
  radio: RadioStation;
  downloads: DownloadQueueManager;
}

/**
 * Collaborators that tests (or alternative deployments) swap out. Anything omitted is built from config.
 */
export interface RegistryOverrides {
  kvStore?: IKeyValueStore;
  remoteStore?: IRemoteCatalogStore;
  downloadRepository?: IDownloadRepository;
  fileTransfer?: IFileTransfer;
  offlineFiles?: IOfflineFileStore;
}

function buildKeyValueStore(config: KeyValueConfig): IKeyValueStore {
  switch (config.kind) {
    case 'redis':
      return createKeyValueStore({ kind: 'redis', serviceName: SERVICE_NAME, keyPrefix: 'robin-radio:', url: config.url });
    case 'file':
      return createKeyValueStore({ kind: 'file', filePath: config.filePath });
    case 'memory':
      return createKeyValueStore({ kind: 'memory' });
  }
}

export function createServiceRegistry(config: CatalogServiceConfig, overrides: RegistryOverrides = {}): ServiceRegistry {
  const kvStore = overrides.kvStore ?? buildKeyValueStore(config.keyValue);
  const remoteStore = overrides.remoteStore ?? createRemoteCatalogStore(config.remoteStore);

  const progress = new ProgressEventStream();
  const urlCache = new ResolvedUrlCache(remoteStore, kvStore);
  const catalogCache = new CatalogCache(kvStore);
  const synchronizer = new CatalogSynchronizer(remoteStore, urlCache, progress, { batchSize: config.syncBatchSize });
  const library = new MusicLibraryService(catalogCache, urlCache, synchronizer, progress, {
    loadBudgetMs: config.loadBudgetMs,
  });
  const radio = new RadioStation(library, { intervalMs: config.radioIntervalMs });

  const downloads = new DownloadQueueManager(
    overrides.downloadRepository ?? new KeyValueDownloadRepository(kvStore),
    overrides.fileTransfer ?? new AxiosFileTransfer(),
    overrides.offlineFiles ?? new LocalOfflineFileStore(config.offlineDir),
    { concurrency: config.downloadConcurrency }
  );

  logger.info('Service registry created', {
    remoteStore: remoteStore.providerName,
    keyValue: overrides.kvStore ? 'override' : config.keyValue.kind,
    downloadConcurrency: config.downloadConcurrency,
  });

  return { kvStore, remoteStore, progress, library, radio, downloads };
}
