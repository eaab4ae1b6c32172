import type { LoggerMethods } from '@ocrean/logger';
import type { DocumentSentences, UploadedFile } from '@ocrean/model';

import type { FileStorage } from './file-storage';
import type { StoragePaths } from './storage-paths';

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';

import { generateDocumentId, validateDocumentId } from './document-id';
import { DocumentNotFoundError, StorageError } from './errors/storage-error';
import {
  parseSentenceRecord,
  serializeSentenceRecord,
} from './sentence-record';
import { createStoragePaths } from './storage-paths';
import { resolveUploadExtension } from './upload-extension';

export interface LocalFileStorageOptions {
  logger: LoggerMethods;

  /**
   * Root directory; `raw/`, `ocr/` and `sentences/` are created beneath it
   */
  baseDir: string;
}

/**
 * LocalFileStorage
 *
 * Keeps uploads and derived artifacts on the local file system:
 * - raw/<id><ext>        uploaded PDF or image
 * - ocr/<id>.txt         OCR output (UTF-8)
 * - sentences/<id>.json  sentence record
 */
export class LocalFileStorage implements FileStorage {
  private readonly logger: LoggerMethods;
  readonly paths: StoragePaths;

  constructor(options: LocalFileStorageOptions) {
    this.logger = options.logger;
    this.paths = createStoragePaths(options.baseDir);
    this.ensureDirectories();
  }

  async saveUploadedFile(file: UploadedFile): Promise<string> {
    const extension = resolveUploadExtension(file);
    const documentId = generateDocumentId();
    const filePath = this.paths.raw(documentId, extension);

    this.write(filePath, file.content, 'Failed to save file');
    this.logger.info(
      '[LocalFileStorage] Saved upload',
      documentId,
      `(${file.content.byteLength} bytes)`,
    );

    return documentId;
  }

  async getRawFilePath(documentId: string): Promise<string | null> {
    const id = validateDocumentId(documentId);
    const match = readdirSync(this.paths.rawDir)
      .sort()
      .find((name) => name.startsWith(`${id}.`));

    return match ? join(this.paths.rawDir, match) : null;
  }

  async getRawFileContent(documentId: string): Promise<Buffer> {
    const id = validateDocumentId(documentId);
    const filePath = await this.getRawFilePath(id);
    if (!filePath) {
      throw new DocumentNotFoundError(id);
    }
    return this.read(filePath, 'Failed to read raw file');
  }

  async loadOcrText(documentId: string): Promise<string> {
    const id = validateDocumentId(documentId);
    const filePath = this.paths.ocrText(id);
    if (!existsSync(filePath)) {
      throw new DocumentNotFoundError(id, 'OCR text not found. Run OCR first.');
    }
    return this.read(filePath, 'Failed to load OCR text').toString('utf-8');
  }

  async saveOcrText(documentId: string, text: string): Promise<string> {
    const id = validateDocumentId(documentId);
    const filePath = this.paths.ocrText(id);

    this.write(filePath, text, 'Failed to save OCR text');
    this.logger.info('[LocalFileStorage] Saved OCR text', id);

    return filePath;
  }

  async saveSentences(
    documentId: string,
    data: DocumentSentences,
  ): Promise<string> {
    const id = validateDocumentId(documentId);
    const filePath = this.paths.sentences(id);

    this.write(filePath, serializeSentenceRecord(data), 'Failed to save sentences');
    this.logger.info(
      '[LocalFileStorage] Saved sentences',
      id,
      `(${data.sentenceCount} sentences)`,
    );

    return filePath;
  }

  async loadSentences(documentId: string): Promise<DocumentSentences> {
    const id = validateDocumentId(documentId);
    const filePath = this.paths.sentences(id);
    if (!existsSync(filePath)) {
      throw new DocumentNotFoundError(
        id,
        'No sentence data found. Generate sentences first.',
      );
    }

    const content = this.read(filePath, 'Failed to load sentences').toString(
      'utf-8',
    );
    return parseSentenceRecord(content, id);
  }

  private ensureDirectories(): void {
    for (const dir of [
      this.paths.rawDir,
      this.paths.ocrDir,
      this.paths.sentencesDir,
    ]) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private write(
    filePath: string,
    content: string | Uint8Array,
    context: string,
  ): void {
    try {
      writeFileSync(filePath, content);
    } catch (error) {
      throw StorageError.fromError(context, error);
    }
  }

  private read(filePath: string, context: string): Buffer {
    try {
      return readFileSync(filePath);
    } catch (error) {
      throw StorageError.fromError(context, error);
    }
  }
}
