export type { DocumentSentences } from './document-sentences';
export type { DocumentVocabulary } from './document-vocabulary';
export type { UploadedFile } from './uploaded-file';
