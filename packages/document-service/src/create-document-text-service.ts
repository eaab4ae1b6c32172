import type { S3Client } from '@aws-sdk/client-s3';
import type { LoggerMethods } from '@ocrean/logger';
import type { SentenceBoundaryProvider } from '@ocrean/text-processor';

import type { OcrEngine } from './ocr-engine';
import type { Settings } from './settings';

import { Logger } from '@ocrean/logger';
import {
  IntlSentenceBoundaryProvider,
  TextProcessor,
  createSpacingCorrector,
} from '@ocrean/text-processor';

import { createFileStorage } from './create-file-storage';
import { DocumentTextService } from './document-text-service';
import { loadSettings } from './settings';

export interface CreateDocumentTextServiceOptions {
  /**
   * Environment to read settings from (default: process.env)
   */
  env?: Record<string, string | undefined>;

  /**
   * Overrides the console logger built from OCREAN_LOG_LEVEL
   */
  logger?: LoggerMethods;

  ocrEngine?: OcrEngine;

  /**
   * Overrides the Intl.Segmenter provider built from OCREAN_SENTENCE_LOCALE
   */
  boundaryProvider?: SentenceBoundaryProvider;

  /**
   * Client for the s3 storage backend (default: built from OCREAN_S3_*)
   */
  s3Client?: S3Client;
}

export interface DocumentTextServiceContext {
  settings: Settings;
  logger: LoggerMethods;
  service: DocumentTextService;
}

/**
 * Wires settings, logger, storage and text processor into a service.
 * The spacing corrector and the storage backend are chosen here, once per
 * process.
 */
export async function createDocumentTextService(
  options: CreateDocumentTextServiceOptions = {},
): Promise<DocumentTextServiceContext> {
  const settings = loadSettings(options.env);
  const logger = options.logger ?? Logger.console(settings.logLevel);

  const storage = await createFileStorage({
    settings,
    logger,
    s3Client: options.s3Client,
  });
  const textProcessor = new TextProcessor({
    logger,
    boundaryProvider:
      options.boundaryProvider ??
      new IntlSentenceBoundaryProvider(settings.sentenceLocale),
    spacingCorrector: createSpacingCorrector(settings.spacing, logger),
  });

  logger.info(
    '[createDocumentTextService] Storage backend:',
    settings.storageBackend,
    settings.storageBackend === 's3' ? settings.s3.bucket : settings.dataDir,
  );

  const service = new DocumentTextService({
    logger,
    storage,
    textProcessor,
    ocrEngine: options.ocrEngine,
  });

  return { settings, logger, service };
}
