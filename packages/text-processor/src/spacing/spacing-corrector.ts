/**
 * Best-effort word-boundary insertion for text that lost its spacing
 * (common in Korean OCR output).
 *
 * Implementations may throw; callers treat a throw as "unavailable for this call".
 */
export interface SpacingCorrector {
  correct(text: string): string;
}

/**
 * Returns text unchanged. Used when spacing correction is disabled.
 */
export class NoopSpacingCorrector implements SpacingCorrector {
  correct(text: string): string {
    return text;
  }
}
