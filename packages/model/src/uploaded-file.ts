/**
 * A raw document (scanned image or PDF) handed to the document store
 */
export interface UploadedFile {
  content: Uint8Array;

  /** MIME type reported by the client, e.g. `application/pdf` or `image/png` */
  contentType?: string;

  /** Original file name, used to keep the image extension */
  filename?: string;
}
