import { describe, expect, test } from 'vitest';

import {
  DocumentNotFoundError,
  InvalidDocumentIdError,
  StorageError,
  UnsupportedFileTypeError,
} from './storage-error';

describe('StorageError', () => {
  test('fromError keeps context and cause', () => {
    const cause = new Error('EACCES: permission denied');
    const error = StorageError.fromError('Failed to save OCR text', cause);

    expect(error.name).toBe('StorageError');
    expect(error.message).toBe(
      'Failed to save OCR text: EACCES: permission denied',
    );
    expect(error.cause).toBe(cause);
  });

  test('getErrorMessage stringifies non-Error values', () => {
    expect(StorageError.getErrorMessage(42)).toBe('42');
  });
});

describe('DocumentNotFoundError', () => {
  test('carries the document id and a default message', () => {
    const error = new DocumentNotFoundError('abc');

    expect(error.name).toBe('DocumentNotFoundError');
    expect(error.message).toBe('Document not found');
    expect(error.documentId).toBe('abc');
    expect(error).toBeInstanceOf(StorageError);
  });
});

describe('InvalidDocumentIdError', () => {
  test('mentions document_id', () => {
    const error = new InvalidDocumentIdError();

    expect(error.name).toBe('InvalidDocumentIdError');
    expect(error.message).toBe('Invalid document_id format.');
  });
});

describe('UnsupportedFileTypeError', () => {
  test('names the rejected content type', () => {
    const error = new UnsupportedFileTypeError('text/plain');

    expect(error.message).toBe(
      'Unsupported file type: text/plain. Only images and PDFs are supported.',
    );
    expect(error.contentType).toBe('text/plain');
  });

  test('reports a missing content type', () => {
    expect(new UnsupportedFileTypeError(undefined).message).toBe(
      'Could not determine file type',
    );
  });
});
