import type { LoggerMethods } from '@ocrean/logger';

import { CommandSpacingCorrector } from './command-spacing-corrector';
import { LazySpacingCorrector } from './lazy-spacing-corrector';
import {
  NoopSpacingCorrector,
  type SpacingCorrector,
} from './spacing-corrector';

export interface SpacingCorrectorConfig {
  enabled: boolean;
  command?: string;
  args?: string[];
  timeoutMs?: number;
}

/**
 * Picks the spacing corrector once at startup.
 * Disabled, or enabled without a command, gives the no-op corrector.
 * The command is checked with a sample run on first use; if that fails the
 * lazy wrapper switches to the no-op corrector for good.
 */
export function createSpacingCorrector(
  config: SpacingCorrectorConfig,
  logger: LoggerMethods,
): SpacingCorrector {
  if (!config.enabled) {
    return new NoopSpacingCorrector();
  }

  const { command } = config;
  if (!command) {
    logger.warn(
      '[createSpacingCorrector] Spacing enabled but no command configured, using no-op corrector',
    );
    return new NoopSpacingCorrector();
  }

  return new LazySpacingCorrector(() => {
    const corrector = new CommandSpacingCorrector({
      command,
      args: config.args,
      timeoutMs: config.timeoutMs,
    });
    corrector.verify();
    return corrector;
  }, logger);
}
