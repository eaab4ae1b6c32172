import type { LoggerMethods } from '@ocrean/logger';

import {
  NoopSpacingCorrector,
  type SpacingCorrector,
} from './spacing-corrector';

/**
 * Constructs the real corrector on first use and keeps it for the life of
 * the process. If construction fails the failure is logged once and every
 * later call falls through to the no-op corrector.
 */
export class LazySpacingCorrector implements SpacingCorrector {
  private readonly factory: () => SpacingCorrector;
  private readonly logger: LoggerMethods;
  private instance: SpacingCorrector | null = null;

  constructor(factory: () => SpacingCorrector, logger: LoggerMethods) {
    this.factory = factory;
    this.logger = logger;
  }

  correct(text: string): string {
    return this.resolve().correct(text);
  }

  /**
   * Whether the underlying corrector has been constructed (successfully or not)
   */
  isInitialized(): boolean {
    return this.instance !== null;
  }

  private resolve(): SpacingCorrector {
    if (this.instance) return this.instance;

    try {
      this.instance = this.factory();
      this.logger.info('[LazySpacingCorrector] Spacing corrector initialized');
    } catch (error) {
      this.logger.warn(
        '[LazySpacingCorrector] Initialization failed, spacing correction disabled:',
        error instanceof Error ? error.message : String(error),
      );
      this.instance = new NoopSpacingCorrector();
    }

    return this.instance;
  }
}
