export { IntlSentenceBoundaryProvider } from './sentence-boundary-provider';
export type { SentenceBoundaryProvider } from './sentence-boundary-provider';
export { splitOnQuotes } from './quote-splitter';
export { SentenceSegmenter } from './sentence-segmenter';
export type { SentenceSegmenterOptions } from './sentence-segmenter';
