/**
 * Cleaned sentences of one document, as produced by the sentence pipeline
 * and persisted by the document store.
 */
export interface DocumentSentences {
  /** Storage-assigned document identifier (UUID) */
  documentId: string;

  /** Sentences in first-appearance order */
  sentences: string[];

  /** Always equal to `sentences.length` */
  sentenceCount: number;
}
