import { TEXT_PROCESSOR } from '../config/constants';

/**
 * Language-aware sentence boundary detection.
 *
 * `split` returns substrings that cover the input left to right, without
 * reordering or altering characters inside each sentence.
 */
export interface SentenceBoundaryProvider {
  split(text: string): string[];
}

/**
 * Sentence boundaries from `Intl.Segmenter` (Unicode UAX #29 rules with
 * locale tailoring). Segments keep their trailing whitespace.
 */
export class IntlSentenceBoundaryProvider implements SentenceBoundaryProvider {
  private readonly segmenter: Intl.Segmenter;

  constructor(locale: string = TEXT_PROCESSOR.DEFAULT_LOCALE) {
    this.segmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
  }

  split(text: string): string[] {
    return Array.from(this.segmenter.segment(text), (data) => data.segment);
  }
}
