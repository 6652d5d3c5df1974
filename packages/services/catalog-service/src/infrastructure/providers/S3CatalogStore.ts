/**
 * S3 catalog store
 * Works against AWS S3 and S3-compatible endpoints. Credentials come from the default AWS provider chain.
 */

import type { S3Client } from '@aws-sdk/client-s3';
import { getLogger, serializeError, toError } from '@robin-radio/platform-core';
import type { CatalogListing, IRemoteCatalogStore } from '../../application/interfaces/IRemoteCatalogStore';
import { CatalogError } from '../../application/errors';
import { mapRemoteError } from './remote-error-mapping';

const logger = getLogger('catalog-service-s3-store');

export interface S3CatalogStoreConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  signedUrlTtlSeconds: number;
}

type S3Sdk = typeof import('@aws-sdk/client-s3');
type PresignerSdk = typeof import('@aws-sdk/s3-request-presigner');

interface S3Runtime {
  client: S3Client;
  sdk: S3Sdk;
  presigner: PresignerSdk;
}

export class S3CatalogStore implements IRemoteCatalogStore {
  readonly providerName = 's3';
  private runtimePromise: Promise<S3Runtime> | null = null;

  constructor(private readonly config: S3CatalogStoreConfig) {}

  async listChildren(path: string): Promise<CatalogListing> {
    const { client, sdk } = await this.getRuntime();
    const prefixes: string[] = [];
    const items: string[] = [];

    try {
      let continuationToken: string | undefined;
      do {
        const response = await client.send(
          new sdk.ListObjectsV2Command({
            Bucket: this.config.bucket,
            Prefix: path,
            Delimiter: '/',
            ContinuationToken: continuationToken,
          })
        );

        for (const commonPrefix of response.CommonPrefixes ?? []) {
          if (commonPrefix.Prefix) prefixes.push(commonPrefix.Prefix);
        }
        for (const object of response.Contents ?? []) {
          if (object.Key && object.Key !== path && !object.Key.endsWith('/')) items.push(object.Key);
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw mapRemoteError(error, 'list', path);
    }

    return { prefixes, items };
  }

  async getDownloadUrl(blobPath: string): Promise<string> {
    const { client, sdk, presigner } = await this.getRuntime();
    try {
      return await presigner.getSignedUrl(client, new sdk.GetObjectCommand({ Bucket: this.config.bucket, Key: blobPath }), {
        expiresIn: this.config.signedUrlTtlSeconds,
      });
    } catch (error) {
      throw mapRemoteError(error, 'sign URL', blobPath);
    }
  }

  private getRuntime(): Promise<S3Runtime> {
    this.runtimePromise ??= this.initialize().catch((error: unknown) => {
      this.runtimePromise = null;
      throw error;
    });
    return this.runtimePromise;
  }

  private async initialize(): Promise<S3Runtime> {
    try {
      const [sdk, presigner] = await Promise.all([import('@aws-sdk/client-s3'), import('@aws-sdk/s3-request-presigner')]);
      const client = new sdk.S3Client({
        region: this.config.region,
        endpoint: this.config.endpoint,
        forcePathStyle: this.config.endpoint !== undefined,
      });
      logger.info('S3 catalog store initialized', { bucket: this.config.bucket, region: this.config.region });
      return { client, sdk, presigner };
    } catch (error) {
      logger.error('Failed to initialize S3 client', { error: serializeError(error) });
      throw CatalogError.serviceUnavailable('S3 client', toError(error));
    }
  }
}
