/**
 * Google Cloud Storage catalog store
 * Lists the bucket one directory level at a time and signs v4 read URLs.
 */

import { z } from 'zod';
import type { Bucket } from '@google-cloud/storage';
import { getLogger, serializeError, toError } from '@robin-radio/platform-core';
import type { CatalogListing, IRemoteCatalogStore } from '../../application/interfaces/IRemoteCatalogStore';
import { CatalogError } from '../../application/errors';
import { mapRemoteError } from './remote-error-mapping';

const logger = getLogger('catalog-service-gcs-store');

export interface GCSCatalogStoreConfig {
  bucketName: string;
  projectId?: string;
  keyFilename?: string;
  signedUrlTtlSeconds: number;
}

const NextPageQuerySchema = z.object({ pageToken: z.string().min(1) }).passthrough();
const ListingResponseSchema = z.object({ prefixes: z.array(z.string()).optional() }).passthrough();

export class GCSCatalogStore implements IRemoteCatalogStore {
  readonly providerName = 'gcs';
  private bucketPromise: Promise<Bucket> | null = null;

  constructor(private readonly config: GCSCatalogStoreConfig) {}

  async listChildren(path: string): Promise<CatalogListing> {
    const bucket = await this.getBucket();
    const prefixes: string[] = [];
    const items: string[] = [];

    try {
      let pageToken: string | undefined;
      do {
        const [files, nextQuery, apiResponse] = await bucket.getFiles({
          prefix: path,
          delimiter: '/',
          autoPaginate: false,
          pageToken,
        });

        for (const file of files) {
          // directory placeholder objects share the prefix name
          if (file.name !== path && !file.name.endsWith('/')) items.push(file.name);
        }
        const response = ListingResponseSchema.safeParse(apiResponse);
        if (response.success) prefixes.push(...(response.data.prefixes ?? []));

        const next = NextPageQuerySchema.safeParse(nextQuery);
        pageToken = next.success ? next.data.pageToken : undefined;
      } while (pageToken);
    } catch (error) {
      throw mapRemoteError(error, 'list', path);
    }

    return { prefixes, items };
  }

  async getDownloadUrl(blobPath: string): Promise<string> {
    const bucket = await this.getBucket();
    try {
      const [signedUrl] = await bucket.file(blobPath).getSignedUrl({
        version: 'v4',
        action: 'read',
        expires: Date.now() + this.config.signedUrlTtlSeconds * 1000,
      });
      return signedUrl;
    } catch (error) {
      throw mapRemoteError(error, 'sign URL', blobPath);
    }
  }

  private getBucket(): Promise<Bucket> {
    this.bucketPromise ??= this.initialize().catch((error: unknown) => {
      this.bucketPromise = null;
      throw error;
    });
    return this.bucketPromise;
  }

  private async initialize(): Promise<Bucket> {
    try {
      const { Storage } = await import('@google-cloud/storage');
      const storage = new Storage({ projectId: this.config.projectId, keyFilename: this.config.keyFilename });
      logger.info('GCS catalog store initialized', { bucket: this.config.bucketName });
      return storage.bucket(this.config.bucketName);
    } catch (error) {
      logger.error('Failed to initialize GCS client', { error: serializeError(error) });
      throw CatalogError.serviceUnavailable('Google Cloud Storage client', toError(error));
    }
  }
}
