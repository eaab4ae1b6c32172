import type { DocumentSentences, UploadedFile } from '@ocrean/model';

/**
 * Storage contract for documents and their derived text artifacts.
 *
 * Implementations validate every document id before touching storage and
 * throw StorageError subclasses for missing or invalid documents.
 * Locations are file paths for local storage and object keys for S3.
 */
export interface FileStorage {
  /**
   * Persist an uploaded PDF/image and return its new document id
   */
  saveUploadedFile(file: UploadedFile): Promise<string>;

  /**
   * Location of the stored raw file, or null if none exists
   */
  getRawFilePath(documentId: string): Promise<string | null>;

  /**
   * Raw file bytes for OCR processing
   */
  getRawFileContent(documentId: string): Promise<Buffer>;

  /**
   * Load OCR output text or throw DocumentNotFoundError
   */
  loadOcrText(documentId: string): Promise<string>;

  /**
   * Persist OCR output and return its location
   */
  saveOcrText(documentId: string, text: string): Promise<string>;

  /**
   * Store processed sentence data and return its location
   */
  saveSentences(documentId: string, data: DocumentSentences): Promise<string>;

  /**
   * Load stored sentence data or throw DocumentNotFoundError
   */
  loadSentences(documentId: string): Promise<DocumentSentences>;
}
