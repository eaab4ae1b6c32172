import type { SpacingCorrector } from './spacing-corrector';

import { spawnSync } from 'node:child_process';

import { SPACING_CORRECTOR } from '../config/constants';
import { SpacingCorrectionError } from '../errors/spacing-correction-error';

export interface CommandSpacingCorrectorOptions {
  /** Executable that reads text on stdin and writes spaced text to stdout */
  command: string;

  args?: string[];

  /** Per-call timeout (default: SPACING_CORRECTOR.DEFAULT_TIMEOUT_MS) */
  timeoutMs?: number;
}

/**
 * Spacing corrector backed by an external command, e.g. a CLI wrapper
 * around a Korean word-spacing model.
 *
 * The call is synchronous so normalization stays a plain function.
 */
export class CommandSpacingCorrector implements SpacingCorrector {
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs: number;

  constructor(options: CommandSpacingCorrectorOptions) {
    if (!options.command.trim()) {
      throw new SpacingCorrectionError('Spacing command must not be empty');
    }
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs ?? SPACING_CORRECTOR.DEFAULT_TIMEOUT_MS;
  }

  correct(text: string): string {
    if (!text) return text;

    const result = spawnSync(this.command, this.args, {
      input: text,
      encoding: 'utf-8',
      timeout: this.timeoutMs,
      maxBuffer: SPACING_CORRECTOR.MAX_BUFFER_BYTES,
    });

    if (result.error) {
      throw SpacingCorrectionError.fromError(
        `Spacing command "${this.command}" failed`,
        result.error,
      );
    }

    if (result.status !== 0) {
      throw new SpacingCorrectionError(
        `Spacing command "${this.command}" exited with code ${result.status}: ${result.stderr.trim()}`,
      );
    }

    return result.stdout.replace(/\r?\n$/, '');
  }

  /**
   * Runs the command once on a short sample.
   * Throws SpacingCorrectionError if it cannot be spawned or fails.
   */
  verify(): void {
    this.correct(SPACING_CORRECTOR.WARMUP_TEXT);
  }
}
