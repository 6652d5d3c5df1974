/**
 * Catalog Service - catalog sync/cache engine and offline download queue
 */

export * from './domains/catalog';
export * from './domains/offline';
export * from './application/errors';
export type * from './application/interfaces';
export * from './application/services';
export * from './infrastructure/ServiceFactory';
export * from './infrastructure/providers/CatalogStoreFactory';
export * from './infrastructure/providers/GCSCatalogStore';
export * from './infrastructure/providers/S3CatalogStore';
export * from './infrastructure/persistence/KeyValueDownloadRepository';
export * from './infrastructure/transfer/AxiosFileTransfer';
export * from './infrastructure/transfer/LocalOfflineFileStore';
export * from './config/service-config';
export { createApp } from './presentation/app';
