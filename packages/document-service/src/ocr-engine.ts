/**
 * Text recognition for a stored raw document.
 * Image/PDF decoding and model inference live behind this interface.
 */
export interface OcrEngine {
  /**
   * @param content - Raw file bytes
   * @param extension - File extension including the dot, e.g. `.pdf`
   * @returns Extracted text, pages joined by blank lines
   */
  extractText(content: Buffer, extension: string): Promise<string>;
}
