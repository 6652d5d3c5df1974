export type * from './IRemoteCatalogStore';
export type * from './IDownloadRepository';
export type * from './IFileTransfer';
export type * from './IOfflineFileStore';
