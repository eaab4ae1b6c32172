/**
 * @ocrean/text-processor
 *
 * Text pipeline for raw OCR output: normalization, sentence segmentation,
 * sentence filtering and Hangul vocabulary extraction.
 *
 * @packageDocumentation
 */

export { TextProcessor } from './text-processor';
export type { TextProcessorOptions } from './text-processor';
export { TextNormalizer } from './normalizer/text-normalizer';
export type { TextNormalizerOptions } from './normalizer/text-normalizer';
export {
  IntlSentenceBoundaryProvider,
  SentenceSegmenter,
  splitOnQuotes,
} from './segmenter';
export type {
  SentenceBoundaryProvider,
  SentenceSegmenterOptions,
} from './segmenter';
export { SentenceFilter } from './filters/sentence-filter';
export { VocabularyExtractor } from './extractors/vocabulary-extractor';
export type { VocabularyExtractorOptions } from './extractors/vocabulary-extractor';
export {
  CommandSpacingCorrector,
  LazySpacingCorrector,
  NoopSpacingCorrector,
  createSpacingCorrector,
} from './spacing';
export type {
  CommandSpacingCorrectorOptions,
  SpacingCorrector,
  SpacingCorrectorConfig,
} from './spacing';
export { SpacingCorrectionError } from './errors/spacing-correction-error';
export { SPACING_CORRECTOR, TEXT_PROCESSOR } from './config/constants';
