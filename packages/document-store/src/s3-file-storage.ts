import type { LoggerMethods } from '@ocrean/logger';
import type { DocumentSentences, UploadedFile } from '@ocrean/model';

import type { FileStorage } from './file-storage';

import {
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  type S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';

import { generateDocumentId, validateDocumentId } from './document-id';
import { DocumentNotFoundError, StorageError } from './errors/storage-error';
import {
  parseSentenceRecord,
  serializeSentenceRecord,
} from './sentence-record';
import { resolveUploadExtension } from './upload-extension';

export interface S3FileStorageOptions {
  logger: LoggerMethods;

  /** Bucket holding the `raw/`, `ocr/` and `sentences/` prefixes */
  bucket: string;

  client: S3Client;
}

/**
 * S3FileStorage
 *
 * Same layout as the local store, as object keys in one bucket:
 * - raw/<id><ext>
 * - ocr/<id>.txt
 * - sentences/<id>.json
 *
 * Call `verifyBucket()` once before use.
 */
export class S3FileStorage implements FileStorage {
  private readonly logger: LoggerMethods;
  private readonly client: S3Client;
  readonly bucket: string;

  constructor(options: S3FileStorageOptions) {
    if (!options.bucket) {
      throw new StorageError('S3 bucket name is required');
    }
    this.logger = options.logger;
    this.client = options.client;
    this.bucket = options.bucket;
  }

  /**
   * HEAD request against the bucket. Fails fast on a missing bucket or
   * missing permissions.
   */
  async verifyBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      const status =
        error instanceof S3ServiceException
          ? error.$metadata.httpStatusCode
          : undefined;
      if (status === 404) {
        throw new StorageError(`S3 bucket '${this.bucket}' does not exist`, {
          cause: error,
        });
      }
      if (status === 403) {
        throw new StorageError(`Access denied to S3 bucket '${this.bucket}'`, {
          cause: error,
        });
      }
      throw StorageError.fromError(
        `Failed to verify S3 bucket '${this.bucket}'`,
        error,
      );
    }

    this.logger.info('[S3FileStorage] Using bucket', this.bucket);
  }

  async saveUploadedFile(file: UploadedFile): Promise<string> {
    const extension = resolveUploadExtension(file);
    const documentId = generateDocumentId();
    const key = `raw/${documentId}${extension}`;

    await this.putObject(
      key,
      Buffer.from(file.content),
      file.contentType,
      'Failed to save file to S3',
      { original_filename: file.filename ?? '', document_id: documentId },
    );
    this.logger.info(
      '[S3FileStorage] Saved upload',
      documentId,
      `(${file.content.byteLength} bytes)`,
    );

    return documentId;
  }

  async getRawFilePath(documentId: string): Promise<string | null> {
    const id = validateDocumentId(documentId);

    try {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: `raw/${id}.`,
          MaxKeys: 1,
        }),
      );
      return response.Contents?.[0]?.Key ?? null;
    } catch (error) {
      throw StorageError.fromError('Failed to look up raw file in S3', error);
    }
  }

  async getRawFileContent(documentId: string): Promise<Buffer> {
    const id = validateDocumentId(documentId);
    const key = await this.getRawFilePath(id);
    if (!key) {
      throw new DocumentNotFoundError(id);
    }

    const content = await this.getObject(key, 'Failed to retrieve file from S3');
    if (!content) {
      throw new DocumentNotFoundError(id);
    }
    return Buffer.from(content);
  }

  async loadOcrText(documentId: string): Promise<string> {
    const id = validateDocumentId(documentId);
    const content = await this.getObject(
      this.ocrKey(id),
      'Failed to load OCR text from S3',
    );
    if (!content) {
      throw new DocumentNotFoundError(id, 'OCR text not found. Run OCR first.');
    }
    return Buffer.from(content).toString('utf-8');
  }

  async saveOcrText(documentId: string, text: string): Promise<string> {
    const id = validateDocumentId(documentId);
    const key = this.ocrKey(id);

    await this.putObject(
      key,
      Buffer.from(text, 'utf-8'),
      'text/plain; charset=utf-8',
      'Failed to save OCR text to S3',
      { document_id: id },
    );
    this.logger.info('[S3FileStorage] Saved OCR text', id);

    return key;
  }

  async saveSentences(
    documentId: string,
    data: DocumentSentences,
  ): Promise<string> {
    const id = validateDocumentId(documentId);
    const key = this.sentencesKey(id);

    await this.putObject(
      key,
      Buffer.from(serializeSentenceRecord(data), 'utf-8'),
      'application/json; charset=utf-8',
      'Failed to save sentences to S3',
      { document_id: id },
    );
    this.logger.info(
      '[S3FileStorage] Saved sentences',
      id,
      `(${data.sentenceCount} sentences)`,
    );

    return key;
  }

  async loadSentences(documentId: string): Promise<DocumentSentences> {
    const id = validateDocumentId(documentId);
    const content = await this.getObject(
      this.sentencesKey(id),
      'Failed to load sentences from S3',
    );
    if (!content) {
      throw new DocumentNotFoundError(
        id,
        'No sentence data found. Generate sentences first.',
      );
    }
    return parseSentenceRecord(Buffer.from(content).toString('utf-8'), id);
  }

  private ocrKey(documentId: string): string {
    return `ocr/${documentId}.txt`;
  }

  private sentencesKey(documentId: string): string {
    return `sentences/${documentId}.json`;
  }

  private async putObject(
    key: string,
    body: Buffer,
    contentType: string | undefined,
    context: string,
    metadata: Record<string, string>,
  ): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          Metadata: metadata,
        }),
      );
    } catch (error) {
      throw StorageError.fromError(context, error);
    }
  }

  /**
   * Object bytes, or null when the key does not exist
   */
  private async getObject(
    key: string,
    context: string,
  ): Promise<Uint8Array | null> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      if (!response.Body) {
        throw new StorageError(`Empty response body for ${key}`);
      }
      return await response.Body.transformToByteArray();
    } catch (error) {
      if (error instanceof NoSuchKey) return null;
      if (error instanceof StorageError) throw error;
      throw StorageError.fromError(context, error);
    }
  }
}
