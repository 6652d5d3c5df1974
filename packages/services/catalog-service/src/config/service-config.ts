/**
 * Catalog service configuration
 */

import { z } from 'zod';
import { optionalEnvString, parseEnvironment, parsePositiveInt, type EnvSource } from '@robin-radio/platform-core';
import { CATALOG_CACHE_TTL_MS } from '../application/services/CatalogCache';
import { URL_CACHE_TTL_MS } from '../application/services/ResolvedUrlCache';

export const SERVICE_NAME = 'catalog-service';

/** GCS v4 signatures and S3 presigned URLs both cap out at seven days */
export const MAX_SIGNED_URL_TTL_SECONDS = 7 * 24 * 60 * 60;

/**
 * A URL resolved just before the URL cache expires is served from the catalog cache for another full catalog TTL.
 */
export const MIN_SIGNED_URL_TTL_SECONDS = (CATALOG_CACHE_TTL_MS + URL_CACHE_TTL_MS) / 1000;

const CatalogServiceEnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3020),
    CATALOG_STORE_PROVIDER: z.enum(['gcs', 's3']).default('gcs'),
    GCS_PROJECT_ID: optionalEnvString,
    GCS_BUCKET: optionalEnvString,
    GCS_KEY_FILENAME: optionalEnvString,
    S3_BUCKET: optionalEnvString,
    S3_REGION: optionalEnvString,
    S3_ENDPOINT: optionalEnvString,
    SIGNED_URL_TTL_SECONDS: z.coerce
      .number()
      .int()
      .min(MIN_SIGNED_URL_TTL_SECONDS, `must outlive the catalog cache (>= ${MIN_SIGNED_URL_TTL_SECONDS} seconds)`)
      .max(MAX_SIGNED_URL_TTL_SECONDS, `exceeds the signed URL limit of ${MAX_SIGNED_URL_TTL_SECONDS} seconds`)
      .default(MAX_SIGNED_URL_TTL_SECONDS),
    KV_STORE: z.enum(['file', 'redis', 'memory']).default('file'),
    KV_FILE_PATH: z.string().min(1).default('./data/robin-radio-store.json'),
    REDIS_URL: optionalEnvString,
    OFFLINE_DIR: z.string().min(1).default('./data/offline_music'),
    DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(3),
    RADIO_INTERVAL_MS: z.coerce.number().int().positive().default(180000),
  })
  .superRefine((env, ctx) => {
    if (env.CATALOG_STORE_PROVIDER === 'gcs' && !env.GCS_BUCKET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GCS_BUCKET'], message: 'required when CATALOG_STORE_PROVIDER=gcs' });
    }
    if (env.CATALOG_STORE_PROVIDER === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['S3_BUCKET'], message: 'required when CATALOG_STORE_PROVIDER=s3' });
    }
  });

export type RemoteStoreConfig =
  | { provider: 'gcs'; bucketName: string; projectId?: string; keyFilename?: string; signedUrlTtlSeconds: number }
  | { provider: 's3'; bucket: string; region: string; endpoint?: string; signedUrlTtlSeconds: number };

export type KeyValueConfig = { kind: 'memory' } | { kind: 'file'; filePath: string } | { kind: 'redis'; url?: string };

export interface CatalogServiceConfig {
  port: number;
  remoteStore: RemoteStoreConfig;
  keyValue: KeyValueConfig;
  offlineDir: string;
  downloadConcurrency: number;
  radioIntervalMs: number;
  syncBatchSize: number;
  loadBudgetMs: number;
}

export function loadServiceConfig(env: EnvSource = process.env): CatalogServiceConfig {
  const parsed = parseEnvironment(SERVICE_NAME, CatalogServiceEnvSchema, env);

  const remoteStore: RemoteStoreConfig =
    parsed.CATALOG_STORE_PROVIDER === 's3'
      ? {
          provider: 's3',
          bucket: parsed.S3_BUCKET ?? '',
          region: parsed.S3_REGION ?? 'us-east-1',
          endpoint: parsed.S3_ENDPOINT,
          signedUrlTtlSeconds: parsed.SIGNED_URL_TTL_SECONDS,
        }
      : {
          provider: 'gcs',
          bucketName: parsed.GCS_BUCKET ?? '',
          projectId: parsed.GCS_PROJECT_ID,
          keyFilename: parsed.GCS_KEY_FILENAME,
          signedUrlTtlSeconds: parsed.SIGNED_URL_TTL_SECONDS,
        };

  const keyValue: KeyValueConfig =
    parsed.KV_STORE === 'redis'
      ? { kind: 'redis', url: parsed.REDIS_URL }
      : parsed.KV_STORE === 'memory'
        ? { kind: 'memory' }
        : { kind: 'file', filePath: parsed.KV_FILE_PATH };

  return {
    port: parsed.PORT,
    remoteStore,
    keyValue,
    offlineDir: parsed.OFFLINE_DIR,
    downloadConcurrency: parsed.DOWNLOAD_CONCURRENCY,
    radioIntervalMs: parsed.RADIO_INTERVAL_MS,
    syncBatchSize: parsePositiveInt('CATALOG_SYNC_BATCH_SIZE', 3, 1, env),
    loadBudgetMs: parsePositiveInt('CATALOG_LOAD_BUDGET_MS', 30000, 1000, env),
  };
}
