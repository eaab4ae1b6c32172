import type { LoggerMethods } from '@ocrean/logger';

import type { Settings } from './settings';

import { S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { LocalFileStorage, S3FileStorage } from '@ocrean/document-store';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { createFileStorage } from './create-file-storage';
import { SettingsError } from './errors/service-errors';
import { loadSettings } from './settings';

describe('createFileStorage', () => {
  let dataDir: string;
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'ocrean-storage-'));
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  function createS3Client(): S3Client {
    return new S3Client({
      region: 'eu-west-3',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
  }

  test('build local storage under the data directory', async () => {
    const storage = await createFileStorage({
      settings: loadSettings({ OCREAN_DATA_DIR: dataDir }),
      logger: mockLogger,
    });

    expect(storage).toBeInstanceOf(LocalFileStorage);
    expect(storage instanceof LocalFileStorage && storage.paths.rawDir).toBe(
      join(dataDir, 'raw'),
    );
  });

  test('build S3 storage once the bucket is reachable', async () => {
    const s3Client = createS3Client();
    const send = vi.fn();
    send.mockResolvedValue({});
    s3Client.send = send;

    const storage = await createFileStorage({
      settings: loadSettings({
        OCREAN_STORAGE_BACKEND: 's3',
        OCREAN_S3_BUCKET: 'ocrean-documents',
      }),
      logger: mockLogger,
      s3Client,
    });

    expect(storage).toBeInstanceOf(S3FileStorage);
    expect(storage instanceof S3FileStorage && storage.bucket).toBe(
      'ocrean-documents',
    );
    expect(send).toHaveBeenCalledTimes(1);
  });

  test('fail fast when the bucket does not exist', async () => {
    const s3Client = createS3Client();
    const send = vi.fn();
    send.mockRejectedValue(
      new S3ServiceException({
        name: 'NotFound',
        $fault: 'client',
        $metadata: { httpStatusCode: 404 },
      }),
    );
    s3Client.send = send;

    await expect(
      createFileStorage({
        settings: loadSettings({
          OCREAN_STORAGE_BACKEND: 's3',
          OCREAN_S3_BUCKET: 'missing-bucket',
        }),
        logger: mockLogger,
        s3Client,
      }),
    ).rejects.toThrow("S3 bucket 'missing-bucket' does not exist");
  });

  test('require a bucket when settings are built by hand', async () => {
    const settings: Settings = {
      ...loadSettings({}, dataDir),
      storageBackend: 's3',
    };

    await expect(
      createFileStorage({ settings, logger: mockLogger }),
    ).rejects.toThrow(SettingsError);
  });
});
