import type { IRemoteCatalogStore } from '../../application/interfaces/IRemoteCatalogStore';
import type { RemoteStoreConfig } from '../../config/service-config';
import { GCSCatalogStore } from './GCSCatalogStore';
import { S3CatalogStore } from './S3CatalogStore';

export function createRemoteCatalogStore(config: RemoteStoreConfig): IRemoteCatalogStore {
  switch (config.provider) {
    case 'gcs':
      return new GCSCatalogStore({
        bucketName: config.bucketName,
        projectId: config.projectId,
        keyFilename: config.keyFilename,
        signedUrlTtlSeconds: config.signedUrlTtlSeconds,
      });
    case 's3':
      return new S3CatalogStore({
        bucket: config.bucket,
        region: config.region,
        endpoint: config.endpoint,
        signedUrlTtlSeconds: config.signedUrlTtlSeconds,
      });
  }
}
