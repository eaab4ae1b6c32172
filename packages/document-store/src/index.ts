/**
 * @ocrean/document-store
 *
 * Storage for uploaded documents, their OCR text and sentence records,
 * on the local file system or in an S3 bucket.
 *
 * @packageDocumentation
 */

export { LocalFileStorage } from './local-file-storage';
export type { LocalFileStorageOptions } from './local-file-storage';
export { S3FileStorage } from './s3-file-storage';
export type { S3FileStorageOptions } from './s3-file-storage';
export type { FileStorage } from './file-storage';
export {
  DocumentNotFoundError,
  InvalidDocumentIdError,
  StorageError,
  UnsupportedFileTypeError,
} from './errors/storage-error';
export {
  documentIdSchema,
  generateDocumentId,
  validateDocumentId,
} from './document-id';
export {
  parseSentenceRecord,
  sentenceRecordSchema,
  serializeSentenceRecord,
} from './sentence-record';
export type { SentenceRecord } from './sentence-record';
export { createStoragePaths } from './storage-paths';
export { resolveUploadExtension } from './upload-extension';
export type { StoragePaths } from './storage-paths';
