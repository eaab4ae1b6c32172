import type { DocumentSentences } from '@ocrean/model';

import { z } from 'zod';

import { StorageError } from './errors/storage-error';

/**
 * Persisted shape of a sentence record (snake_case on disk)
 */
export const sentenceRecordSchema = z
  .object({
    document_id: z.string(),
    sentences: z.array(z.string()),
    sentence_count: z.number().int().nonnegative(),
  })
  .refine((record) => record.sentence_count === record.sentences.length, {
    message: 'sentence_count does not match the number of sentences',
    path: ['sentence_count'],
  });

export type SentenceRecord = z.infer<typeof sentenceRecordSchema>;

export function toSentenceRecord(data: DocumentSentences): SentenceRecord {
  return {
    document_id: data.documentId,
    sentences: data.sentences,
    sentence_count: data.sentenceCount,
  };
}

export function fromSentenceRecord(record: SentenceRecord): DocumentSentences {
  return {
    documentId: record.document_id,
    sentences: record.sentences,
    sentenceCount: record.sentence_count,
  };
}

/**
 * JSON written by every storage backend (two-space indentation)
 */
export function serializeSentenceRecord(data: DocumentSentences): string {
  return JSON.stringify(toSentenceRecord(data), null, 2);
}

/**
 * Parses and validates a stored record.
 *
 * @throws StorageError when the content is not JSON or not a valid record
 */
export function parseSentenceRecord(
  content: string,
  documentId: string,
): DocumentSentences {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw StorageError.fromError(
      `Malformed sentence record for ${documentId}`,
      error,
    );
  }

  const result = sentenceRecordSchema.safeParse(parsed);
  if (!result.success) {
    throw StorageError.fromError(
      `Malformed sentence record for ${documentId}`,
      result.error,
    );
  }

  return fromSentenceRecord(result.data);
}
