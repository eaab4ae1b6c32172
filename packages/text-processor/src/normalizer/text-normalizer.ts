import type { LoggerMethods } from '@ocrean/logger';

import type { SpacingCorrector } from '../spacing/spacing-corrector';

import { NoopSpacingCorrector } from '../spacing/spacing-corrector';
import { collapseWhitespace } from '../utils/char-utils';

/**
 * Literal two-character `\n` sequences left by OCR/transcription tools
 */
const LITERAL_NEWLINE_PATTERN = /\\n/g;

/**
 * A double quote preceded by one or more literal backslashes
 */
const ESCAPED_QUOTE_PATTERN = /\\+"/g;

export interface TextNormalizerOptions {
  logger: LoggerMethods;

  /**
   * Optional word-spacing pass (default: no-op)
   */
  spacingCorrector?: SpacingCorrector;
}

/**
 * TextNormalizer - repairs raw OCR text
 *
 * - Unicode normalization (NFC)
 * - Literal `\n` escapes become spaces, `\"` escapes become bare quotes
 * - Whitespace runs collapse to a single space
 * - Optional spacing correction, falling back to the uncorrected text on failure
 * - Leading and trailing whitespace is trimmed
 *
 * Output never contains a backslash-quote sequence or two consecutive
 * whitespace characters, and `normalize(normalize(x)) === normalize(x)`
 * as long as the spacing corrector is itself idempotent.
 */
export class TextNormalizer {
  private readonly logger: LoggerMethods;
  private readonly spacingCorrector: SpacingCorrector;

  constructor(options: TextNormalizerOptions) {
    this.logger = options.logger;
    this.spacingCorrector =
      options.spacingCorrector ?? new NoopSpacingCorrector();
  }

  normalize(text: string | null | undefined): string {
    if (!text) return '';

    let normalized = text.normalize('NFC');
    normalized = normalized.replace(LITERAL_NEWLINE_PATTERN, ' ');
    normalized = normalized.replace(ESCAPED_QUOTE_PATTERN, '"');
    normalized = collapseWhitespace(normalized);

    normalized = this.applySpacing(normalized);

    // Spacing may introduce new runs
    return collapseWhitespace(normalized).trim();
  }

  private applySpacing(text: string): string {
    try {
      return this.spacingCorrector.correct(text);
    } catch (error) {
      this.logger.warn(
        '[TextNormalizer] Spacing correction failed, keeping original text:',
        error instanceof Error ? error.message : String(error),
      );
      return text;
    }
  }
}
