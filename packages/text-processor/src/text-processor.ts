import type { LoggerMethods } from '@ocrean/logger';

import type { SentenceBoundaryProvider } from './segmenter/sentence-boundary-provider';
import type { SpacingCorrector } from './spacing/spacing-corrector';

import { TEXT_PROCESSOR } from './config/constants';
import { VocabularyExtractor } from './extractors/vocabulary-extractor';
import { SentenceFilter } from './filters/sentence-filter';
import { TextNormalizer } from './normalizer/text-normalizer';
import { IntlSentenceBoundaryProvider } from './segmenter/sentence-boundary-provider';
import { SentenceSegmenter } from './segmenter/sentence-segmenter';

/**
 * TextProcessor Options
 */
export interface TextProcessorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Sentence boundary detection (default: Intl.Segmenter for Korean)
   */
  boundaryProvider?: SentenceBoundaryProvider;

  /**
   * Word-spacing correction applied during normalization (default: none).
   * Chosen once at startup, see createSpacingCorrector.
   */
  spacingCorrector?: SpacingCorrector;
}

/**
 * TextProcessor
 *
 * Turns raw OCR text into cleaned sentences and a Hangul vocabulary list.
 *
 * raw text -> TextNormalizer -> SentenceSegmenter -> SentenceFilter
 *                            -> VocabularyExtractor
 *
 * Every method is a pure function of its input and never throws.
 *
 * @example
 * ```typescript
 * const processor = new TextProcessor({ logger: Logger.console() });
 * processor.splitIntoSentences('첫 문장입니다. 12 둘째 문장입니다.');
 * // ['첫 문장입니다.', '둘째 문장입니다.']
 * processor.extractVocabulary('옷 하나 옷 둘', 2);
 * // ['하나']
 * ```
 */
export class TextProcessor {
  private readonly normalizer: TextNormalizer;
  private readonly segmenter: SentenceSegmenter;
  private readonly vocabularyExtractor: VocabularyExtractor;

  constructor(options: TextProcessorOptions) {
    this.normalizer = new TextNormalizer({
      logger: options.logger,
      spacingCorrector: options.spacingCorrector,
    });
    this.segmenter = new SentenceSegmenter({
      boundaryProvider:
        options.boundaryProvider ?? new IntlSentenceBoundaryProvider(),
    });
    this.vocabularyExtractor = new VocabularyExtractor({
      normalizer: this.normalizer,
    });
  }

  /**
   * Normalizes whitespace and repairs OCR escape artifacts
   */
  cleanText(text: string | null | undefined): string {
    return this.normalizer.normalize(text);
  }

  /**
   * Splits raw text into cleaned sentences in reading order
   */
  splitIntoSentences(text: string | null | undefined): string[] {
    const normalized = this.normalizer.normalize(text);
    if (!normalized) return [];

    const segments = this.segmenter.segment(normalized);
    return SentenceFilter.filterAll(segments);
  }

  /**
   * Extracts unique Hangul words of at least `minLength` syllables
   */
  extractVocabulary(
    text: string | null | undefined,
    minLength: number = TEXT_PROCESSOR.DEFAULT_MIN_WORD_LENGTH,
  ): string[] {
    return this.vocabularyExtractor.extract(text, minLength);
  }
}
