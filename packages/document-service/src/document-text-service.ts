import type { FileStorage } from '@ocrean/document-store';
import type { LoggerMethods } from '@ocrean/logger';
import type {
  DocumentSentences,
  DocumentVocabulary,
  UploadedFile,
} from '@ocrean/model';
import type { TextProcessor } from '@ocrean/text-processor';

import type { OcrEngine } from './ocr-engine';

import {
  DocumentNotFoundError,
  validateDocumentId,
} from '@ocrean/document-store';
import { TEXT_PROCESSOR } from '@ocrean/text-processor';
import { extname } from 'node:path';

import { OcrUnavailableError } from './errors/service-errors';

/**
 * DocumentTextService Options
 */
export interface DocumentTextServiceOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  storage: FileStorage;

  textProcessor: TextProcessor;

  /**
   * Required only for runOcr
   */
  ocrEngine?: OcrEngine;
}

export interface OcrResult {
  documentId: string;
  text: string;
}

/**
 * DocumentTextService
 *
 * Document workflow on top of the store:
 * upload -> OCR -> sentences (persisted) / vocabulary (returned only).
 */
export class DocumentTextService {
  private readonly logger: LoggerMethods;
  private readonly storage: FileStorage;
  private readonly textProcessor: TextProcessor;
  private readonly ocrEngine: OcrEngine | undefined;

  constructor(options: DocumentTextServiceOptions) {
    this.logger = options.logger;
    this.storage = options.storage;
    this.textProcessor = options.textProcessor;
    this.ocrEngine = options.ocrEngine;
  }

  /**
   * Stores an uploaded image or PDF and returns its document id
   */
  async uploadDocument(file: UploadedFile): Promise<{ documentId: string }> {
    const documentId = await this.storage.saveUploadedFile(file);
    return { documentId };
  }

  /**
   * Runs OCR on a previously uploaded document and stores the text
   */
  async runOcr(documentId: string): Promise<OcrResult> {
    const id = validateDocumentId(documentId);

    if (!this.ocrEngine) {
      throw new OcrUnavailableError();
    }

    const rawPath = await this.storage.getRawFilePath(id);
    if (!rawPath) {
      throw new DocumentNotFoundError(id, 'Document not found. Upload first.');
    }

    const content = await this.storage.getRawFileContent(id);
    this.logger.info('[DocumentTextService] Running OCR for', id);

    let text: string;
    try {
      text = await this.ocrEngine.extractText(content, extname(rawPath));
    } catch (error) {
      this.logger.error('[DocumentTextService] OCR failed for', id, error);
      throw error;
    }

    await this.storage.saveOcrText(id, text);
    this.logger.info(
      '[DocumentTextService] OCR completed for',
      id,
      `(${text.length} chars)`,
    );

    return { documentId: id, text };
  }

  /**
   * Splits the stored OCR text into sentences and persists the record
   */
  async generateSentences(documentId: string): Promise<DocumentSentences> {
    const id = validateDocumentId(documentId);
    const text = await this.storage.loadOcrText(id);
    const sentences = this.textProcessor.splitIntoSentences(text);

    const record: DocumentSentences = {
      documentId: id,
      sentences,
      sentenceCount: sentences.length,
    };
    await this.storage.saveSentences(id, record);
    this.logger.info(
      '[DocumentTextService] Generated',
      sentences.length,
      'sentences for',
      id,
    );

    return record;
  }

  /**
   * Previously generated sentence record
   */
  async getSentences(documentId: string): Promise<DocumentSentences> {
    return this.storage.loadSentences(validateDocumentId(documentId));
  }

  /**
   * Extracts Hangul vocabulary from the stored OCR text.
   * The result is not persisted; `minLength` is echoed as requested.
   */
  async extractVocabulary(
    documentId: string,
    minLength: number = TEXT_PROCESSOR.DEFAULT_MIN_WORD_LENGTH,
  ): Promise<DocumentVocabulary> {
    const id = validateDocumentId(documentId);
    const text = await this.storage.loadOcrText(id);
    const vocabulary = this.textProcessor.extractVocabulary(text, minLength);

    this.logger.debug(
      '[DocumentTextService] Extracted',
      vocabulary.length,
      'words for',
      id,
    );

    return {
      documentId: id,
      vocabulary,
      vocabularyCount: vocabulary.length,
      minLength,
    };
  }
}
