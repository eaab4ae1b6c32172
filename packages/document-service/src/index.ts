/**
 * @ocrean/document-service
 *
 * Document workflow (upload, OCR hand-off, sentences, vocabulary) with
 * environment-driven configuration.
 *
 * @packageDocumentation
 */

export { DocumentTextService } from './document-text-service';
export type {
  DocumentTextServiceOptions,
  OcrResult,
} from './document-text-service';
export { createDocumentTextService } from './create-document-text-service';
export type {
  CreateDocumentTextServiceOptions,
  DocumentTextServiceContext,
} from './create-document-text-service';
export { createFileStorage } from './create-file-storage';
export type { CreateFileStorageOptions } from './create-file-storage';
export { STORAGE_BACKENDS, loadSettings, settingsSchema } from './settings';
export type { S3Settings, Settings, StorageBackend } from './settings';
export type { OcrEngine } from './ocr-engine';
export { OcrUnavailableError, SettingsError } from './errors/service-errors';
