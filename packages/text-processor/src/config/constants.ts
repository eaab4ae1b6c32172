/**
 * Configuration constants for the text-processing pipeline
 */
export const TEXT_PROCESSOR = {
  /**
   * Sentences shorter than this (in code points) are discarded
   */
  MIN_SENTENCE_LENGTH: 3,

  /**
   * Characters trimmed from both ends of every sentence segment
   */
  SENTENCE_STRIP_CHARS: ' :;-—"\'“”‘’·•()[]',

  /**
   * Longest digit run treated as a stray page or footnote number
   */
  DIGIT_ORPHAN_MAX_LENGTH: 4,

  /**
   * Default locale for the sentence boundary provider
   */
  DEFAULT_LOCALE: 'ko',

  /**
   * Default minimum vocabulary word length
   */
  DEFAULT_MIN_WORD_LENGTH: 1,
} as const;

/**
 * Configuration constants for CommandSpacingCorrector
 */
export const SPACING_CORRECTOR = {
  /**
   * Per-call timeout for the external spacing command in milliseconds
   */
  DEFAULT_TIMEOUT_MS: 5000,

  /**
   * Upper bound for the command's stdout in bytes
   */
  MAX_BUFFER_BYTES: 16 * 1024 * 1024,

  /**
   * Sample run once through the command before it is put to use
   */
  WARMUP_TEXT: '띄어쓰기확인',
} as const;

/**
 * Precomposed Hangul syllables (U+AC00 to U+D7A3)
 */
export const HANGUL_SYLLABLE_RUN_PATTERN = /[가-힣]+/g;
