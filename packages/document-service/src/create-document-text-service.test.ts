import type { LoggerMethods } from '@ocrean/logger';

import { HeadBucketCommand, S3Client } from '@aws-sdk/client-s3';
import { Logger } from '@ocrean/logger';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { createDocumentTextService } from './create-document-text-service';
import { SettingsError } from './errors/service-errors';

describe('createDocumentTextService', () => {
  let dataDir: string;
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'ocrean-service-'));
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

  test('run the whole workflow against local storage', async () => {
    const { service, settings } = await createDocumentTextService({
      env: { OCREAN_DATA_DIR: dataDir },
      logger: mockLogger,
      ocrEngine: {
        extractText: async () =>
          '정해진 일은 아무지게 끝내고 41 반성은 나중에 \\"오늘은 이 옷으로 정했어!\\" 외출 준비를 한다.',
      },
    });

    expect(settings.dataDir).toBe(dataDir);
    expect(existsSync(join(dataDir, 'raw'))).toBe(true);

    const { documentId } = await service.uploadDocument({
      content: new Uint8Array([1, 2, 3]),
      contentType: 'image/png',
      filename: 'page.png',
    });
    await service.runOcr(documentId);

    const record = await service.generateSentences(documentId);
    expect(record.sentences).toEqual([
      '정해진 일은 아무지게 끝내고 반성은 나중에',
      '오늘은 이 옷으로 정했어!',
      '외출 준비를 한다.',
    ]);
    expect(record.sentenceCount).toBe(3);
    expect(await service.getSentences(documentId)).toEqual(record);
    expect(existsSync(join(dataDir, 'sentences', `${documentId}.json`))).toBe(
      true,
    );

    expect(await service.extractVocabulary(documentId, 4)).toEqual({
      documentId,
      vocabulary: ['아무지게'],
      vocabularyCount: 1,
      minLength: 4,
    });
  });

  test('use the injected boundary provider', async () => {
    const boundaryProvider = {
      split: vi.fn(() => ['첫째 문장입니다.', '둘째 문장입니다.']),
    };
    const { service } = await createDocumentTextService({
      env: { OCREAN_DATA_DIR: dataDir },
      logger: mockLogger,
      boundaryProvider,
      ocrEngine: { extractText: async () => '  원문\\n텍스트  ' },
    });

    const { documentId } = await service.uploadDocument({
      content: new Uint8Array([1]),
      contentType: 'application/pdf',
    });
    await service.runOcr(documentId);

    expect((await service.generateSentences(documentId)).sentences).toEqual([
      '첫째 문장입니다.',
      '둘째 문장입니다.',
    ]);
    expect(boundaryProvider.split).toHaveBeenCalledWith('원문 텍스트');
  });

  test('log the storage backend on startup', async () => {
    await createDocumentTextService({
      env: { OCREAN_DATA_DIR: dataDir },
      logger: mockLogger,
    });

    expect(mockLogger.info).toHaveBeenCalledWith(
      '[createDocumentTextService] Storage backend:',
      'local',
      dataDir,
    );
  });

  test('verify the bucket and log it for the s3 backend', async () => {
    const s3Client = new S3Client({
      region: 'eu-west-3',
      credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });
    const send = vi.fn();
    send.mockResolvedValue({});
    s3Client.send = send;

    const { settings } = await createDocumentTextService({
      env: {
        OCREAN_STORAGE_BACKEND: 's3',
        OCREAN_S3_BUCKET: 'ocrean-documents',
      },
      logger: mockLogger,
      s3Client,
    });

    expect(settings.storageBackend).toBe('s3');
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0]).toBeInstanceOf(HeadBucketCommand);
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[createDocumentTextService] Storage backend:',
      's3',
      'ocrean-documents',
    );
  });

  test('build a console logger from the configured level', async () => {
    const consoleSpy = vi.spyOn(Logger, 'console');

    const { logger } = await createDocumentTextService({
      env: { OCREAN_DATA_DIR: dataDir, OCREAN_LOG_LEVEL: 'error' },
    });

    expect(consoleSpy).toHaveBeenCalledWith('error');
    expect(logger).toBeInstanceOf(Logger);
    consoleSpy.mockRestore();
  });

  test('surface invalid settings', async () => {
    await expect(
      createDocumentTextService({
        env: { OCREAN_DATA_DIR: dataDir, OCREAN_STORAGE_BACKEND: 's3' },
        logger: mockLogger,
      }),
    ).rejects.toThrow(SettingsError);
  });
});
