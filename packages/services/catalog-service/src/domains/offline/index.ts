export * from './entities/DownloadItem';
export * from './entities/OfflineSong';
export * from './offline-file-name';
