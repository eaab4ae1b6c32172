import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { InvalidDocumentIdError } from './errors/storage-error';

/**
 * Document ID format: canonical UUID
 */
export const documentIdSchema = z.string().uuid({
  message: 'Invalid document_id format.',
});

export function generateDocumentId(): string {
  return randomUUID();
}

/**
 * Validates a document id and returns it lowercased.
 * Anything that is not a UUID (including path fragments) is rejected.
 */
export function validateDocumentId(documentId: unknown): string {
  const result = documentIdSchema.safeParse(documentId);
  if (!result.success) {
    throw new InvalidDocumentIdError();
  }
  return result.data.toLowerCase();
}
