import { toError } from '@robin-radio/platform-core';
import { CatalogError } from '../../application/errors';

/**
 * HTTP status carried by an SDK error: `code` on GCS ApiError, `$metadata.httpStatusCode` on AWS errors.
 * Socket and DNS failures carry none.
 */
export function remoteStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      return metadata.httpStatusCode;
    }
  }
  return undefined;
}

export function mapRemoteError(error: unknown, operation: string, path: string): CatalogError {
  if (error instanceof CatalogError) return error;

  const cause = toError(error);
  const status = remoteStatusOf(error);
  switch (status) {
    case undefined:
      return CatalogError.networkError(operation, cause);
    case 401:
      return CatalogError.unauthenticated(cause);
    case 403:
      return CatalogError.permissionDenied(path, cause);
    default:
      return CatalogError.storageError(operation, status, cause);
  }
}
