export { NoopSpacingCorrector } from './spacing-corrector';
export type { SpacingCorrector } from './spacing-corrector';
export { CommandSpacingCorrector } from './command-spacing-corrector';
export type { CommandSpacingCorrectorOptions } from './command-spacing-corrector';
export { LazySpacingCorrector } from './lazy-spacing-corrector';
export { createSpacingCorrector } from './create-spacing-corrector';
export type { SpacingCorrectorConfig } from './create-spacing-corrector';
