/**
 * StorageError
 *
 * Base error for document store failures.
 */
export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create StorageError from unknown error with context
   */
  static fromError(context: string, error: unknown): StorageError {
    return new StorageError(
      `${context}: ${StorageError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * DocumentNotFoundError
 *
 * A raw file, OCR text or sentence record does not exist for the document.
 */
export class DocumentNotFoundError extends StorageError {
  readonly documentId: string;

  constructor(documentId: string, message = 'Document not found') {
    super(message);
    this.name = 'DocumentNotFoundError';
    this.documentId = documentId;
  }
}

/**
 * InvalidDocumentIdError
 *
 * The supplied id is not a UUID. Rejected before any path is built from it.
 */
export class InvalidDocumentIdError extends StorageError {
  constructor(message = 'Invalid document_id format.') {
    super(message);
    this.name = 'InvalidDocumentIdError';
  }
}

/**
 * UnsupportedFileTypeError
 *
 * Uploads must be PDFs or images.
 */
export class UnsupportedFileTypeError extends StorageError {
  readonly contentType: string | undefined;

  constructor(contentType: string | undefined) {
    super(
      contentType
        ? `Unsupported file type: ${contentType}. Only images and PDFs are supported.`
        : 'Could not determine file type',
    );
    this.name = 'UnsupportedFileTypeError';
    this.contentType = contentType;
  }
}
