import { TEXT_PROCESSOR } from '../config/constants';
import {
  codePointLength,
  collapseWhitespace,
  stripChars,
} from '../utils/char-utils';

/**
 * Word characters are Unicode letters, numbers and underscore.
 * A short run of decimal digits with no word character on either side is a
 * stray page or footnote number.
 */
const DIGIT_ORPHAN_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}_])\\p{Nd}{1,${TEXT_PROCESSOR.DIGIT_ORPHAN_MAX_LENGTH}}(?![\\p{L}\\p{N}_])`,
  'gu',
);

/**
 * Whole string made of non-word characters, decimal digits and underscores
 */
const NOISE_PATTERN = /^[^\p{L}\p{Nl}\p{No}]+$/u;

/**
 * SentenceFilter - cleans sentence segments and rejects noise
 *
 * Per segment:
 * 1. Trim boundary punctuation and quotes
 * 2. Remove orphan digit runs (1-4 digits)
 * 3. Collapse whitespace and trim boundary characters again
 * 4. Reject if shorter than the minimum length (code points)
 * 5. Reject if nothing but digits, punctuation and underscores remain
 */
export class SentenceFilter {
  /**
   * Cleans one segment
   *
   * @returns The cleaned sentence, or null when the segment is rejected
   */
  static filter(segment: string): string | null {
    if (!segment) return null;

    let text = stripChars(segment, TEXT_PROCESSOR.SENTENCE_STRIP_CHARS);
    text = text.replace(DIGIT_ORPHAN_PATTERN, '');
    // Removing digits can expose new boundary punctuation
    text = stripChars(
      collapseWhitespace(text),
      TEXT_PROCESSOR.SENTENCE_STRIP_CHARS,
    );

    if (codePointLength(text) < TEXT_PROCESSOR.MIN_SENTENCE_LENGTH) {
      return null;
    }
    if (NOISE_PATTERN.test(text)) {
      return null;
    }
    return text;
  }

  /**
   * Cleans segments in order and drops the rejected ones
   */
  static filterAll(segments: string[]): string[] {
    const sentences: string[] = [];
    for (const segment of segments) {
      const sentence = this.filter(segment);
      if (sentence !== null) {
        sentences.push(sentence);
      }
    }
    return sentences;
  }
}
