/**
 * Hangul vocabulary extracted from one document's OCR text.
 * Returned to the caller directly, never persisted.
 */
export interface DocumentVocabulary {
  documentId: string;

  /** Unique words sorted by code point */
  vocabulary: string[];

  vocabularyCount: number;

  /** Minimum word length as requested by the caller */
  minLength: number;
}
