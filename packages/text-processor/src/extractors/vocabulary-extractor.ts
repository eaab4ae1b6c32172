import type { TextNormalizer } from '../normalizer/text-normalizer';

import { uniq } from 'es-toolkit';

import {
  HANGUL_SYLLABLE_RUN_PATTERN,
  TEXT_PROCESSOR,
} from '../config/constants';
import { codePointLength } from '../utils/char-utils';

export interface VocabularyExtractorOptions {
  normalizer: TextNormalizer;
}

/**
 * VocabularyExtractor
 *
 * Collects unique runs of Hangul syllables from normalized text and returns
 * them sorted by code point, so identical input always gives identical output.
 */
export class VocabularyExtractor {
  private readonly normalizer: TextNormalizer;

  constructor(options: VocabularyExtractorOptions) {
    this.normalizer = options.normalizer;
  }

  /**
   * @param text - Raw or normalized text
   * @param minLength - Shortest word to keep; values below 1 count as 1
   */
  extract(
    text: string | null | undefined,
    minLength: number = TEXT_PROCESSOR.DEFAULT_MIN_WORD_LENGTH,
  ): string[] {
    const normalized = this.normalizer.normalize(text);
    if (!normalized) return [];

    const threshold = VocabularyExtractor.resolveMinLength(minLength);
    const words = uniq(normalized.match(HANGUL_SYLLABLE_RUN_PATTERN) ?? []);

    return words
      .filter((word) => codePointLength(word) >= threshold)
      .sort();
  }

  /**
   * Clamps the requested minimum length to a whole number of at least 1
   */
  static resolveMinLength(minLength: number): number {
    if (!Number.isFinite(minLength)) return 1;
    return Math.max(1, Math.ceil(minLength));
  }
}
