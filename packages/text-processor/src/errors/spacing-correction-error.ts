/**
 * SpacingCorrectionError
 *
 * Thrown by a spacing corrector when the underlying service fails.
 * TextNormalizer catches it and keeps the uncorrected text.
 */
export class SpacingCorrectionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SpacingCorrectionError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create SpacingCorrectionError from unknown error with context
   */
  static fromError(context: string, error: unknown): SpacingCorrectionError {
    return new SpacingCorrectionError(
      `${context}: ${SpacingCorrectionError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
