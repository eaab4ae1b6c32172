import type { FileStorage } from '@ocrean/document-store';
import type { LoggerMethods } from '@ocrean/logger';

import type { Settings } from './settings';

import { S3Client } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-providers';
import { LocalFileStorage, S3FileStorage } from '@ocrean/document-store';

import { SettingsError } from './errors/service-errors';

export interface CreateFileStorageOptions {
  settings: Settings;
  logger: LoggerMethods;

  /**
   * Client for the s3 backend (default: built from the S3 settings)
   */
  s3Client?: S3Client;
}

/**
 * Builds the storage backend named by the settings.
 * An S3 bucket is checked before the store is returned.
 */
export async function createFileStorage(
  options: CreateFileStorageOptions,
): Promise<FileStorage> {
  const { settings, logger } = options;

  if (settings.storageBackend === 'local') {
    return new LocalFileStorage({ logger, baseDir: settings.dataDir });
  }

  const { bucket, region, profile } = settings.s3;
  if (!bucket) {
    throw new SettingsError([
      'OCREAN_S3_BUCKET: S3 bucket name is required when using the s3 storage backend',
    ]);
  }

  const client =
    options.s3Client ??
    new S3Client({
      region,
      credentials: profile ? fromIni({ profile }) : undefined,
    });

  const storage = new S3FileStorage({ logger, bucket, client });
  await storage.verifyBucket();
  return storage;
}
