import type { SentenceBoundaryProvider } from './sentence-boundary-provider';

import { splitOnQuotes } from './quote-splitter';

export interface SentenceSegmenterOptions {
  boundaryProvider: SentenceBoundaryProvider;
}

/**
 * SentenceSegmenter
 *
 * Splits normalized text into raw segments: first on sentence boundaries
 * (delegated to the boundary provider), then on quoted spans. Segment order
 * follows the source text.
 */
export class SentenceSegmenter {
  private readonly boundaryProvider: SentenceBoundaryProvider;

  constructor(options: SentenceSegmenterOptions) {
    this.boundaryProvider = options.boundaryProvider;
  }

  /**
   * @param text - Already normalized text
   */
  segment(text: string): string[] {
    if (!text) return [];

    return this.boundaryProvider
      .split(text)
      .flatMap((sentence) => splitOnQuotes(sentence));
  }
}
