export * from './ProgressEventStream';
export * from './ResolvedUrlCache';
export * from './CatalogCache';
export * from './CatalogSynchronizer';
export * from './MusicLibraryService';
export * from './RadioStation';
export * from './DownloadQueueManager';
