import type { UploadedFile } from '@ocrean/model';

import { extname } from 'node:path';

import { UnsupportedFileTypeError } from './errors/storage-error';

const PDF_CONTENT_TYPE = 'application/pdf';
const IMAGE_PREFIX = 'image/';
const DEFAULT_IMAGE_EXTENSION = '.jpg';

/**
 * Determine the file extension for an upload based on its metadata.
 * Images keep the client's extension when there is one.
 *
 * @throws UnsupportedFileTypeError for anything but PDFs and images
 */
export function resolveUploadExtension(file: UploadedFile): string {
  const { contentType } = file;

  if (contentType === PDF_CONTENT_TYPE) {
    return '.pdf';
  }

  if (contentType?.startsWith(IMAGE_PREFIX)) {
    const suffix = file.filename ? extname(file.filename) : '';
    return suffix || DEFAULT_IMAGE_EXTENSION;
  }

  throw new UnsupportedFileTypeError(contentType || undefined);
}
