import { join } from 'node:path';

/**
 * On-disk layout of the local document store
 */
export function createStoragePaths(baseDir: string) {
  const rawDir = join(baseDir, 'raw');
  const ocrDir = join(baseDir, 'ocr');
  const sentencesDir = join(baseDir, 'sentences');

  return {
    baseDir,
    rawDir,
    ocrDir,
    sentencesDir,

    raw: (documentId: string, extension: string) =>
      join(rawDir, `${documentId}${extension}`),
    ocrText: (documentId: string) => join(ocrDir, `${documentId}.txt`),
    sentences: (documentId: string) =>
      join(sentencesDir, `${documentId}.json`),
  };
}

export type StoragePaths = ReturnType<typeof createStoragePaths>;
