/**
 * SettingsError
 *
 * Environment configuration failed validation. The message lists every
 * offending variable.
 */
export class SettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid settings: ${issues.join('; ')}`);
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

/**
 * OcrUnavailableError
 *
 * OCR was requested but the service was created without an OCR engine.
 */
export class OcrUnavailableError extends Error {
  constructor(message = 'No OCR engine configured') {
    super(message);
    this.name = 'OcrUnavailableError';
  }
}
