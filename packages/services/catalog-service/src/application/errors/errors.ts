import { DomainErrorCode, createDomainServiceError } from '@robin-radio/platform-core';

const CatalogDomainCodes = {
  REMOTE_PERMISSION_DENIED: 'REMOTE_PERMISSION_DENIED',
  REMOTE_UNAUTHENTICATED: 'REMOTE_UNAUTHENTICATED',
  REMOTE_STORAGE_ERROR: 'REMOTE_STORAGE_ERROR',
  NETWORK_ERROR: 'NETWORK_ERROR',
  CACHE_READ_FAILED: 'CACHE_READ_FAILED',
  CACHE_WRITE_FAILED: 'CACHE_WRITE_FAILED',
  CACHE_CORRUPTED: 'CACHE_CORRUPTED',
} as const;

export const CatalogErrorCode = { ...DomainErrorCode, ...CatalogDomainCodes } as const;
export type CatalogErrorCodeType = (typeof CatalogErrorCode)[keyof typeof CatalogErrorCode];

export type CatalogErrorCategory = 'not-found' | 'timeout' | 'remote-store' | 'network' | 'cache' | 'internal';

const CATEGORY_BY_CODE: Partial<Record<CatalogErrorCodeType, CatalogErrorCategory>> = {
  [CatalogErrorCode.NOT_FOUND]: 'not-found',
  [CatalogErrorCode.TIMEOUT]: 'timeout',
  [CatalogErrorCode.REMOTE_PERMISSION_DENIED]: 'remote-store',
  [CatalogErrorCode.REMOTE_UNAUTHENTICATED]: 'remote-store',
  [CatalogErrorCode.REMOTE_STORAGE_ERROR]: 'remote-store',
  [CatalogErrorCode.SERVICE_UNAVAILABLE]: 'remote-store',
  [CatalogErrorCode.NETWORK_ERROR]: 'network',
  [CatalogErrorCode.CACHE_READ_FAILED]: 'cache',
  [CatalogErrorCode.CACHE_WRITE_FAILED]: 'cache',
  [CatalogErrorCode.CACHE_CORRUPTED]: 'cache',
};

const CatalogErrorBase = createDomainServiceError('Catalog', CatalogErrorCode);

export class CatalogError extends CatalogErrorBase {
  get category(): CatalogErrorCategory {
    return CATEGORY_BY_CODE[this.code] ?? 'internal';
  }

  static override notFound(resource: string, id?: string) {
    const message = id ? `${resource} not found: ${id}` : `${resource} not found`;
    return new CatalogError(message, 404, CatalogErrorCode.NOT_FOUND, undefined, id ? { resource, id } : { resource });
  }

  static override serviceUnavailable(service: string, cause?: Error) {
    return new CatalogError(`Service unavailable: ${service}`, 503, CatalogErrorCode.SERVICE_UNAVAILABLE, cause);
  }

  static timeout(operation: string, cause?: Error) {
    return new CatalogError(`Operation timed out: ${operation}`, 504, CatalogErrorCode.TIMEOUT, cause, { operation });
  }

  static permissionDenied(path: string, cause?: Error) {
    return new CatalogError(
      `Permission denied accessing remote catalog: ${path}`,
      502,
      CatalogErrorCode.REMOTE_PERMISSION_DENIED,
      cause,
      { path }
    );
  }

  static unauthenticated(cause?: Error) {
    return new CatalogError('Remote catalog rejected credentials', 502, CatalogErrorCode.REMOTE_UNAUTHENTICATED, cause);
  }

  static storageError(operation: string, status: number | undefined, cause?: Error) {
    return new CatalogError(
      `Remote catalog ${operation} failed${status ? ` with status ${status}` : ''}`,
      502,
      CatalogErrorCode.REMOTE_STORAGE_ERROR,
      cause,
      status ? { operation, status } : { operation }
    );
  }

  static networkError(operation: string, cause?: Error) {
    return new CatalogError(`Network failure during ${operation}`, 503, CatalogErrorCode.NETWORK_ERROR, cause, {
      operation,
    });
  }

  static cacheReadFailed(key: string, cause?: Error) {
    return new CatalogError(`Failed to read cache entry: ${key}`, 500, CatalogErrorCode.CACHE_READ_FAILED, cause, { key });
  }

  static cacheWriteFailed(key: string, cause?: Error) {
    return new CatalogError(`Failed to write cache entry: ${key}`, 500, CatalogErrorCode.CACHE_WRITE_FAILED, cause, { key });
  }

  static cacheCorrupted(key: string, cause?: Error) {
    return new CatalogError(`Cache entry is corrupted: ${key}`, 500, CatalogErrorCode.CACHE_CORRUPTED, cause, { key });
  }

  static emptyCatalog() {
    return new CatalogError('No albums found in the remote catalog', 404, CatalogErrorCode.NOT_FOUND);
  }
}

const DownloadDomainCodes = {
  DOWNLOAD_ALREADY_EXISTS: 'DOWNLOAD_ALREADY_EXISTS',
  DOWNLOAD_NOT_FOUND: 'DOWNLOAD_NOT_FOUND',
  OFFLINE_SONG_NOT_FOUND: 'OFFLINE_SONG_NOT_FOUND',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  TRANSFER_FAILED: 'TRANSFER_FAILED',
} as const;

export const DownloadErrorCode = { ...DomainErrorCode, ...DownloadDomainCodes } as const;
export type DownloadErrorCodeType = (typeof DownloadErrorCode)[keyof typeof DownloadErrorCode];

const DownloadErrorBase = createDomainServiceError('Download', DownloadErrorCode);

export class DownloadError extends DownloadErrorBase {
  static alreadyExists(songId: string, downloadId: string) {
    return new DownloadError(
      `A download for song ${songId} already exists`,
      409,
      DownloadErrorCode.DOWNLOAD_ALREADY_EXISTS,
      undefined,
      { songId, downloadId }
    );
  }

  static downloadNotFound(id: string) {
    return new DownloadError(`Download not found: ${id}`, 404, DownloadErrorCode.DOWNLOAD_NOT_FOUND, undefined, { id });
  }

  static offlineSongNotFound(songId: string) {
    return new DownloadError(`Offline song not found: ${songId}`, 404, DownloadErrorCode.OFFLINE_SONG_NOT_FOUND, undefined, {
      songId,
    });
  }

  static invalidTransition(id: string, from: string, to: string) {
    return new DownloadError(
      `Cannot move download ${id} from ${from} to ${to}`,
      409,
      DownloadErrorCode.INVALID_STATE_TRANSITION,
      undefined,
      { id, from, to }
    );
  }

  static httpStatus(status: number, statusText: string) {
    return new DownloadError(`HTTP ${status}: ${statusText}`, 502, DownloadErrorCode.TRANSFER_FAILED, undefined, {
      status,
    });
  }

  static transferFailed(url: string, cause?: Error) {
    return new DownloadError(cause?.message ?? 'Transfer failed', 502, DownloadErrorCode.TRANSFER_FAILED, cause, {
      host: safeHost(url),
    });
  }
}

function safeHost(url: string): string | undefined {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
}
